import React from "react";
import { Box, Text } from "ink";

export interface HelpEntry {
  usage: string;
  description: string;
}

interface HelpViewProps {
  entries: HelpEntry[];
  unknown?: string;
  suggestion?: string;
}

export function HelpView({ entries, unknown, suggestion }: HelpViewProps) {
  return (
    <Box flexDirection="column">
      {unknown !== undefined ? (
        <Text color="red">
          Unknown command: {unknown}
          {suggestion ? <Text color="gray"> (did you mean {suggestion}?)</Text> : null}
        </Text>
      ) : null}
      <Text bold>{"Usage: club-sync <command>"}</Text>
      <Box marginLeft={1} flexDirection="column">
        {entries.map((entry) => (
          <Text key={entry.usage}>
            <Text color="yellow">{entry.usage.padEnd(18)}</Text>
            <Text color="gray">{entry.description}</Text>
          </Text>
        ))}
      </Box>
    </Box>
  );
}
