import {describe, expect, it} from "vitest";

import {DEFAULT_HISTORY_COUNT, parseCommand, splitCommandLine} from "../../chat/commandParser.js";
import {OperationCatalog} from "../../runtime/catalog.js";
import {applySuggestion, getCommandSuggestions} from "../../utils/commands.js";
import {NREPL_TOOLS} from "../helpers/fakeServer.js";

describe("parseCommand", () => {
  it("treats blank input as empty", () => {
    expect(parseCommand("   ")).toEqual({kind: "empty"});
  });

  it("keeps the code after eval verbatim", () => {
    expect(parseCommand('eval (str "a"  "b")')).toEqual({kind: "eval", code: '(str "a"  "b")'});
    expect(parseCommand("/EVAL (+ 1 2)")).toEqual({kind: "eval", code: "(+ 1 2)"});
    expect(parseCommand("e (inc 1)")).toEqual({kind: "eval", code: "(inc 1)"});
  });

  it("asks for code when eval has none", () => {
    expect(parseCommand("eval")).toEqual({kind: "unknown", message: "Usage: eval <code>"});
  });

  it("splits a tool call into name and JSON text", () => {
    expect(parseCommand('tool nrepl-eval {"code": "(+ 1 2)"}')).toEqual({
      kind: "tool",
      name: "nrepl-eval",
      argsJson: '{"code": "(+ 1 2)"}'
    });
    expect(parseCommand("call nrepl-status")).toEqual({kind: "tool", name: "nrepl-status"});
    expect(parseCommand("tool")).toEqual({kind: "unknown", message: "Usage: tool <name> [json-args]"});
  });

  it("reads the history count", () => {
    expect(parseCommand("history")).toEqual({kind: "history", count: DEFAULT_HISTORY_COUNT});
    expect(parseCommand("history 5")).toEqual({kind: "history", count: 5});
    expect(parseCommand("history 0")).toEqual({kind: "unknown", message: "Usage: history [count]"});
    expect(parseCommand("history lots")).toEqual({kind: "unknown", message: "Usage: history [count]"});
  });

  it("maps aliases onto their commands", () => {
    expect(parseCommand("?")).toEqual({kind: "help"});
    expect(parseCommand("list")).toEqual({kind: "tools"});
    expect(parseCommand("cls")).toEqual({kind: "clear"});
    expect(parseCommand("exit")).toEqual({kind: "quit"});
    expect(parseCommand("q")).toEqual({kind: "quit"});
    expect(parseCommand("status")).toEqual({kind: "status"});
  });

  it("recognises the summary flag on test", () => {
    expect(parseCommand("test")).toEqual({kind: "test", summaryOnly: false});
    expect(parseCommand("scenario summary")).toEqual({kind: "test", summaryOnly: true});
  });

  it("reports unknown words", () => {
    expect(parseCommand("frobnicate now")).toEqual({
      kind: "unknown",
      message: 'Unknown command: frobnicate. Type "help" to see what I can do.'
    });
  });

  it("splits the command word from its tail", () => {
    expect(splitCommandLine("  /Tool  nrepl-eval  {}  ")).toEqual({word: "tool", tail: "nrepl-eval  {}"});
  });
});

describe("command completion", () => {
  const catalog = OperationCatalog.fromListResult({tools: NREPL_TOOLS});
  const commands = (input: string) => getCommandSuggestions(input, catalog).map((option) => option.command);

  it("completes command words by prefix", () => {
    expect(commands("e")).toEqual(["eval"]);
    expect(commands("t")).toEqual(["tools", "tool", "test"]);
    expect(commands("/he")).toEqual(["help"]);
  });

  it("offers tool names after the command words", () => {
    expect(commands("nrepl-")).toEqual(["nrepl-eval", "nrepl-status", "nrepl-health-check", "nrepl-test"]);
  });

  it("offers only tool names for the argument of tool", () => {
    expect(commands("tool nrepl-s")).toEqual(["nrepl-status"]);
    expect(commands("call ")).toEqual(["nrepl-eval", "nrepl-status", "nrepl-health-check", "nrepl-test"]);
  });

  it("offers nothing past the first word of other commands", () => {
    expect(commands("eval (+ 1")).toEqual([]);
    expect(commands("")).toEqual([]);
  });

  it("replaces the word being completed", () => {
    expect(applySuggestion("ev", "eval")).toBe("eval ");
    expect(applySuggestion("tool nrepl-s", "nrepl-status")).toBe("tool nrepl-status ");
  });
});
