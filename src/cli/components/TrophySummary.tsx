import React from "react";
import { Box, Text } from "ink";
import type { TrophyStats } from "../../types/index.js";

export function TrophySummary({ stats }: { stats: TrophyStats }) {
  return (
    <Box flexDirection="column">
      <Text bold color={stats.errors.length > 0 ? "yellow" : "green"}>
        🏆 {stats.trophiesAwarded} trophies awarded
      </Text>
      <Box marginLeft={1} flexDirection="column">
        <Text color="gray">
          {stats.weeksProcessed} weeks processed, {stats.weeksSkipped} skipped
        </Text>
        {stats.errors.map((error, i) => (
          <Text key={i} color="red">
            ✗ {error}
          </Text>
        ))}
      </Box>
    </Box>
  );
}
