import React, {useCallback, useEffect, useMemo, useRef, useState} from "react";
import {Box, Static, Text, useApp, useInput, useStdout} from "ink";
import TextInput from "ink-text-input";
import Spinner from "ink-spinner";

import {Banner} from "./components/Banner.js";
import {CommandSuggestions} from "./components/CommandSuggestions.js";
import {SessionStatusFooter} from "./components/SessionStatusFooter.js";
import {overviewMessage} from "./commands/executor.js";
import type {ReplController, ReplState} from "./repl/controller.js";
import type {ClientRuntime} from "./runtime/client.js";
import {applySuggestion, type CommandOption} from "./utils/commands.js";

type ChatRole = "system" | "user" | "output" | "error";

interface ChatMessage {
  id: number;
  role: ChatRole;
  text: string;
}

interface AppProps {
  controller: ReplController;
  runtime: Pick<ClientRuntime, "session" | "history">;
  notices?: string[];
}

export default function App({controller, runtime, notices = []}: AppProps) {
  const {exit} = useApp();
  const {write} = useStdout();
  const [messages, setMessages] = useState<ChatMessage[]>(() => [
    ...notices.map((text, index) => ({id: index + 1, role: "system" as const, text})),
    {id: notices.length + 1, role: "system", text: overviewMessage()}
  ]);
  const messageCounter = useRef(notices.length + 2);
  const [screen, setScreen] = useState(0);
  const [inputValue, setInputValue] = useState("");
  const [replState, setReplState] = useState<ReplState>(controller.state);
  const [suggestions, setSuggestions] = useState<CommandOption[]>([]);
  const [selectedSuggestionIndex, setSelectedSuggestionIndex] = useState(0);
  const [recallIndex, setRecallIndex] = useState<number | null>(null);
  const [warning, setWarning] = useState<string | undefined>();

  const busy = replState === "dispatching";

  const addMessage = useCallback((role: ChatRole, text: string) => {
    const id = messageCounter.current++;
    setMessages((prev) => [...prev, {id, role, text}]);
  }, []);

  const shutdown = useCallback(() => {
    controller
      .close()
      .then(() => exit())
      .catch((error: unknown) => exit(error instanceof Error ? error : new Error(String(error))));
  }, [controller, exit]);

  // Update suggestions when input changes
  useEffect(() => {
    setSuggestions(inputValue.length > 0 ? controller.suggestions(inputValue) : []);
    setSelectedSuggestionIndex(0);
  }, [inputValue, controller]);

  useInput((input, key) => {
    if (key.ctrl && input === "c") {
      // An in-flight exchange is left to complete or time out
      if (busy) {
        setWarning("Waiting for the server; press Ctrl+C again once it answers to quit.");
        return;
      }
      shutdown();
      return;
    }

    if (key.ctrl && input === "d" && inputValue.length === 0 && !busy) {
      shutdown();
      return;
    }

    if (key.tab) {
      const selected = suggestions[selectedSuggestionIndex];
      if (selected) {
        setInputValue(applySuggestion(inputValue, selected.command));
      }
      return;
    }

    if (suggestions.length > 0 && (key.upArrow || key.downArrow)) {
      setSelectedSuggestionIndex((prev) => {
        if (key.upArrow) {
          return prev > 0 ? prev - 1 : suggestions.length - 1;
        }
        return prev < suggestions.length - 1 ? prev + 1 : 0;
      });
      return;
    }

    if (key.upArrow || key.downArrow) {
      const lines = controller.recallLines();
      if (lines.length === 0) {
        return;
      }
      if (key.upArrow) {
        const next = recallIndex === null ? lines.length - 1 : Math.max(0, recallIndex - 1);
        setRecallIndex(next);
        setInputValue(lines[next] ?? "");
      } else if (recallIndex !== null) {
        const next = recallIndex + 1;
        setRecallIndex(next >= lines.length ? null : next);
        setInputValue(next >= lines.length ? "" : lines[next] ?? "");
      }
    }
  });

  const handleSubmit = useCallback(
    async (value: string) => {
      if (busy) {
        return;
      }
      const trimmed = value.trim();
      setInputValue("");
      setRecallIndex(null);
      setWarning(undefined);
      if (!trimmed) {
        return;
      }

      addMessage("user", trimmed);
      setReplState("dispatching");
      const result = await controller.submit(trimmed);
      setReplState(controller.state);

      if (result.clearScreen) {
        write("\x1b[2J\x1b[3J\x1b[H");
        setMessages([]);
        setScreen((count) => count + 1);
      }
      if (result.lines.length > 0) {
        addMessage(result.isError ? "error" : "output", result.lines.join("\n"));
      }
      if (result.shouldExit || controller.state === "closed") {
        shutdown();
      }
    },
    [busy, controller, addMessage, write, shutdown]
  );

  const renderMessages = () => {
    const items = [
      ...(screen === 0 ? [{id: 0, type: "banner" as const}] : []),
      ...messages.map((m) => ({...m, type: "message" as const}))
    ];
    return (
      <Static key={screen} items={items}>
        {(item) => {
          if (item.type === "banner") {
            return <Banner key="banner" />;
          }
          return (
            <Box key={item.id} flexDirection="column" marginBottom={1}>
              <MessageBubble role={item.role} text={item.text} />
            </Box>
          );
        }}
      </Static>
    );
  };

  const inputPrompt = useMemo(() => {
    if (busy) {
      return (
        <Text color="yellow">
          <Spinner type="dots" /> Working...
        </Text>
      );
    }
    return <Text color="cyan">nrepl›</Text>;
  }, [busy]);

  const rule = "═".repeat(Math.min(process.stdout.columns || 80, 80));
  const selected = suggestions[selectedSuggestionIndex];

  return (
    <Box flexDirection="column" gap={1}>
      {renderMessages()}
      {suggestions.length > 0 && <CommandSuggestions suggestions={suggestions} selectedIndex={selectedSuggestionIndex} />}
      <Box flexDirection="column" marginTop={1}>
        <Box>
          <Text color="gray">{rule}</Text>
        </Box>
        <Box>
          {inputPrompt}
          <Box marginLeft={1} flexGrow={1}>
            <Box>
              <TextInput
                value={inputValue}
                onChange={setInputValue}
                onSubmit={(value) => void handleSubmit(value)}
                placeholder="eval (+ 1 2 3), tools, help..."
                focus={!busy}
              />
              {selected && selected.command.startsWith(lastWord(inputValue)) && (
                <Text color="gray" dimColor>
                  {selected.command.substring(lastWord(inputValue).length)}
                </Text>
              )}
            </Box>
          </Box>
        </Box>
        <Box>
          <Text color="gray">{rule}</Text>
        </Box>
        {warning && (
          <Box marginTop={1}>
            <Text color="yellow">{`⚠️  ${warning}`}</Text>
          </Box>
        )}
        <Box marginTop={1}>
          <SessionStatusFooter
            endpoint={runtime.session.endpoint}
            connected={runtime.session.initialized}
            serverName={runtime.session.serverInfo?.name}
            toolCount={runtime.session.catalog.size}
            historySize={runtime.history.size}
            state={replState}
          />
        </Box>
      </Box>
    </Box>
  );
}

function lastWord(input: string): string {
  return input.slice(input.search(/\S*$/));
}

interface MessageBubbleProps {
  role: ChatRole;
  text: string;
}

function MessageBubble({role, text}: MessageBubbleProps) {
  const color = roleColor(role);
  const label = roleLabel(role);

  return (
    <Box flexDirection="column">
      {label && (
        <Box marginBottom={0}>
          <Text bold color={color}>
            {label}
          </Text>
        </Box>
      )}
      <Box paddingLeft={label ? 2 : 0}>
        <Text color={role === "system" ? "gray" : undefined}>{text}</Text>
      </Box>
    </Box>
  );
}

function roleLabel(role: ChatRole): string | undefined {
  switch (role) {
    case "user":
      return "nrepl>";
    case "error":
      return "Error";
    case "output":
    case "system":
    default:
      return undefined;
  }
}

function roleColor(role: ChatRole): string | undefined {
  switch (role) {
    case "user":
      return "green";
    case "error":
      return "red";
    case "output":
      return "cyan";
    case "system":
    default:
      return "magenta";
  }
}
