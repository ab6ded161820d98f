import React from "react";
import { Box, Text } from "ink";
import type { SyncAllStats, SyncUserResult } from "../../types/index.js";

interface SyncUserSummaryProps {
  userId: number;
  result: SyncUserResult;
}

export function SyncUserSummary({ userId, result }: SyncUserSummaryProps) {
  if (!result.success) {
    return (
      <Box flexDirection="column">
        <Text bold color="red">
          Sync failed for user {userId}
        </Text>
        <Text color="gray">
          {result.code}: {result.error}
        </Text>
      </Box>
    );
  }

  const { zones, segments } = result.enrichment;
  return (
    <Box flexDirection="column">
      <Text bold color="green">
        Synced user {userId}
      </Text>
      <Box marginLeft={1} flexDirection="column">
        <Text>
          Activities: {result.newActivities} new of {result.fetched} fetched
        </Text>
        <Text>
          HR zones: {zones.enriched}/{zones.attempted}
          {zones.failed > 0 ? <Text color="yellow"> ({zones.failed} failed)</Text> : null}
        </Text>
        <Text>
          Segments: {segments.enriched}/{segments.attempted} activities, {segments.efforts} efforts
          {segments.failed > 0 ? <Text color="yellow"> ({segments.failed} failed)</Text> : null}
        </Text>
      </Box>
    </Box>
  );
}

export function SyncAllSummary({ stats }: { stats: SyncAllStats }) {
  return (
    <Box flexDirection="column">
      <Text bold color={stats.failed > 0 ? "yellow" : "green"}>
        Synced {stats.successful}/{stats.totalUsers} users, {stats.newActivities} new activities
      </Text>
      {stats.errors.map((error, i) => (
        <Box key={i} marginLeft={1}>
          <Text color="red">✗ {error}</Text>
        </Box>
      ))}
    </Box>
  );
}
