import React from "react";
import {Box, Text} from "ink";

const MCP = [
  "███╗   ███╗ ██████╗██████╗ ",
  "████╗ ████║██╔════╝██╔══██╗",
  "██╔████╔██║██║     ██████╔╝",
  "██║╚██╔╝██║██║     ██╔═══╝ ",
  "██║ ╚═╝ ██║╚██████╗██║     ",
  "╚═╝     ╚═╝ ╚═════╝╚═╝     "
];

const NREPL = [
  " ███╗   ██╗██████╗ ███████╗██████╗ ██╗     ",
  " ████╗  ██║██╔══██╗██╔════╝██╔══██╗██║     ",
  " ██╔██╗ ██║██████╔╝█████╗  ██████╔╝██║     ",
  " ██║╚██╗██║██╔══██╗██╔══╝  ██╔═══╝ ██║     ",
  " ██║ ╚████║██║  ██║███████╗██║     ███████╗",
  " ╚═╝  ╚═══╝╚═╝  ╚═╝╚══════╝╚═╝     ╚══════╝"
];

export function Banner() {
  return (
    <Box flexDirection="column" marginBottom={1}>
      {MCP.map((row, index) => (
        <Box key={index}>
          <Text bold>
            <Text color="cyan">{row}</Text>
            <Text color="magenta">{NREPL[index]}</Text>
          </Text>
        </Box>
      ))}
    </Box>
  );
}
