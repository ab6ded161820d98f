import React from "react";
import { Box, Text } from "ink";
import type { StatusReport } from "../../types/index.js";

function Row({ label, value }: { label: string; value: string | number }) {
  return (
    <Text>
      <Text color="gray">{label.padEnd(22)}</Text>
      {value}
    </Text>
  );
}

export function StatusView({ report, databasePath }: { report: StatusReport; databasePath: string }) {
  return (
    <Box flexDirection="column">
      <Text bold color="cyan">
        Club sync status
      </Text>
      <Box marginLeft={1} flexDirection="column">
        <Row label="Database" value={databasePath} />
        <Row label="Schema version" value={report.schemaVersion} />
        <Row label="Users" value={`${report.activeUsers} active / ${report.totalUsers} total`} />
        <Row label="Activities" value={report.activities} />
        <Row label="Latest activity" value={report.latestActivity ?? "none"} />
        <Row label="Awaiting segments" value={report.pendingSegmentActivities} />
        <Row label="Trophy weeks" value={report.trophyWeeks} />
      </Box>
    </Box>
  );
}
