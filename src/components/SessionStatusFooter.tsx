import {Box, Text} from "ink";

import type {ReplState} from "../repl/controller.js";

interface SessionStatusFooterProps {
  endpoint: string;
  connected: boolean;
  toolCount: number;
  historySize: number;
  state: ReplState;
  serverName?: string;
}

export function SessionStatusFooter({endpoint, connected, toolCount, historySize, state, serverName}: SessionStatusFooterProps) {
  const getStatusText = (): string => {
    if (!connected) return "Disconnected";
    if (state === "dispatching") return "Waiting for server";
    return "Connected";
  };

  const getStatusColor = (): string => {
    if (!connected) return "red";
    if (state === "dispatching") return "yellow";
    return "green";
  };

  return (
    <Box flexDirection="row" gap={1}>
      <Text color={getStatusColor()}>
        Session: {getStatusText()}
      </Text>
      <Text>
        <Text color="gray"> | Endpoint: </Text>
        <Text color="cyan">{endpoint}</Text>
      </Text>
      {serverName && (
        <Text>
          <Text color="gray"> | Server: </Text>
          <Text color="cyan">{serverName}</Text>
        </Text>
      )}
      <Text>
        <Text color="gray"> | Tools: </Text>
        <Text color="cyan">{toolCount}</Text>
      </Text>
      <Text>
        <Text color="gray"> | History: </Text>
        <Text color="cyan">{historySize}</Text>
      </Text>
    </Box>
  );
}
