import React from "react";
import { Box, Text } from "ink";
import type {
  KudosLeaderboardEntry,
  TopKudosActivity,
  TrophyLeaderboardEntry,
  TrophyWinner,
} from "../../types/index.js";
import { displayName, fit, formatKm } from "../format.js";

const NAME_WIDTH = 24;

function Section({ title, children }: { title: string; children: React.ReactNode }) {
  return (
    <Box flexDirection="column" marginBottom={1}>
      <Text bold color="cyan">
        {title}
      </Text>
      <Box marginLeft={1} flexDirection="column">
        {children}
      </Box>
    </Box>
  );
}

function Empty() {
  return <Text color="gray">Nothing yet.</Text>;
}

function rank(index: number): string {
  return `${index + 1}.`.padEnd(4);
}

export function TrophyTable({ entries }: { entries: TrophyLeaderboardEntry[] }) {
  return (
    <Section title="Trophy leaderboard">
      {entries.length === 0 ? (
        <Empty />
      ) : (
        entries.map((entry, i) => (
          <Text key={entry.user_id}>
            {rank(i)}
            {fit(displayName(entry.firstname, entry.lastname), NAME_WIDTH)} <Text color="yellow">{entry.trophy_count} 🏆</Text>
            <Text color="gray">
              {"  "}
              {formatKm(entry.total_winning_distance)}, latest {entry.latest_trophy}
            </Text>
          </Text>
        ))
      )}
    </Section>
  );
}

export function RecentWinners({ winners }: { winners: TrophyWinner[] }) {
  return (
    <Section title="Recent weekly winners">
      {winners.length === 0 ? (
        <Empty />
      ) : (
        winners.map((winner) => (
          <Text key={`${winner.week_start}-${winner.user_id}`}>
            <Text color="gray">{winner.week_start}</Text> {fit(displayName(winner.firstname, winner.lastname), NAME_WIDTH)}{" "}
            {formatKm(winner.total_distance)}
            <Text color="gray"> ({winner.activity_count} activities)</Text>
          </Text>
        ))
      )}
    </Section>
  );
}

export function KudosTable({ title, entries }: { title: string; entries: KudosLeaderboardEntry[] }) {
  return (
    <Section title={title}>
      {entries.length === 0 ? (
        <Empty />
      ) : (
        entries.map((entry, i) => (
          <Text key={entry.user_id}>
            {rank(i)}
            {fit(displayName(entry.firstname, entry.lastname), NAME_WIDTH)} <Text color="magenta">{entry.total_kudos} kudos</Text>
            <Text color="gray"> over {entry.activity_count} activities</Text>
          </Text>
        ))
      )}
    </Section>
  );
}

export function TopActivity({ activity }: { activity: TopKudosActivity | null }) {
  return (
    <Section title="Most kudoed activity">
      {activity === null ? (
        <Empty />
      ) : (
        <Text>
          {activity.name || activity.type} by {displayName(activity.firstname, activity.lastname)}
          <Text color="gray">
            {" "}
            ({activity.type}, {formatKm(activity.distance)}, {activity.start_date.slice(0, 10)})
          </Text>{" "}
          <Text color="magenta">{activity.kudos_count} kudos</Text>
        </Text>
      )}
    </Section>
  );
}

export interface LeaderboardsProps {
  trophies: TrophyLeaderboardEntry[];
  recentWinners: TrophyWinner[];
  weeklyKudos: KudosLeaderboardEntry[];
  allTimeKudos: KudosLeaderboardEntry[];
  topActivity: TopKudosActivity | null;
}

export function Leaderboards({ trophies, recentWinners, weeklyKudos, allTimeKudos, topActivity }: LeaderboardsProps) {
  return (
    <Box flexDirection="column">
      <TrophyTable entries={trophies} />
      <RecentWinners winners={recentWinners} />
      <KudosTable title="Kudos this week" entries={weeklyKudos} />
      <KudosTable title="Kudos all time" entries={allTimeKudos} />
      <TopActivity activity={topActivity} />
    </Box>
  );
}
