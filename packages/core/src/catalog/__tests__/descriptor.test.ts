import { describe, it, expect } from "vitest";
import { SchemaError } from "@cmdpal/sdk";
import type { CommandSignature, NamedArguments } from "@cmdpal/sdk";
import {
  buildDeclaredDescriptor,
  buildRegisteredDescriptor,
  deriveCommandName,
} from "../descriptor.js";

function commandClass(name: string, signature: CommandSignature, doc?: string) {
  const cls = class {
    static readonly signature = signature;
    static readonly doc = doc;
    run(_context: unknown, _args: NamedArguments): void {}
  };
  Object.defineProperty(cls, "name", { value: name });
  return cls;
}

describe("deriveCommandName", () => {
  it("strips the Command suffix and converts to snake_case", () => {
    expect(deriveCommandName("RunTextCommand")).toBe("run_text");
    expect(deriveCommandName("MoveCommand")).toBe("move");
    expect(deriveCommandName("GotoLine")).toBe("goto_line");
  });

  it("leaves a name without the suffix intact apart from casing", () => {
    expect(deriveCommandName("Commandeer")).toBe("commandeer");
  });

  it("splits only where a lowercase letter meets an uppercase one", () => {
    expect(deriveCommandName("HTMLExportCommand")).toBe("htmlexport");
    expect(deriveCommandName("Toggle2Pane")).toBe("toggle2pane");
  });

  it("yields an empty name for the bare suffix", () => {
    expect(deriveCommandName("Command")).toBe("");
  });
});

describe("buildDeclaredDescriptor", () => {
  it("splits bare names and [name, default] pairs", () => {
    const descriptor = buildDeclaredDescriptor({
      name: "goto_line",
      args: ["line", ["column", 0], ["select", false]],
      doc: "Jump to a line",
    });

    expect(descriptor).toEqual({
      name: "goto_line",
      requiredArgs: ["line"],
      optionalArgs: [
        ["column", 0],
        ["select", false],
      ],
      doc: "Jump to a line",
      hasArbitraryArgs: false,
    });
  });

  it("reproduces the declared order across both lists", () => {
    const shapes: unknown[][] = [
      [],
      ["a"],
      [["a", 1]],
      ["a", "b", ["c", null], ["d", { e: [] }]],
    ];
    for (const args of shapes) {
      const descriptor = buildDeclaredDescriptor({ name: "cmd", args });
      const names = [...descriptor.requiredArgs, ...descriptor.optionalArgs.map(([name]) => name)];
      const expected = args.map(arg => (Array.isArray(arg) ? arg[0] : arg));
      expect(names).toEqual(expected);
    }
  });

  it("passes has_arbitrary_args through", () => {
    expect(buildDeclaredDescriptor({ name: "exec", has_arbitrary_args: true }).hasArbitraryArgs).toBe(true);
  });

  it("rejects a required argument after an optional one", () => {
    expect(() => buildDeclaredDescriptor({ name: "goto", args: [["column", 0], "line"] })).toThrow(
      new SchemaError("goto", "Cannot specify required arguments after optional ones"),
    );
  });

  it("rejects pairs that are not exactly two elements", () => {
    expect(() => buildDeclaredDescriptor({ name: "goto", args: ["a", ["b"]] })).toThrow(
      'Command "goto" is malformed: Need exactly argument name and default value',
    );
    expect(() => buildDeclaredDescriptor({ name: "goto", args: [["b", 1, 2]] })).toThrow(SchemaError);
  });

  it("rejects entries that are neither names nor pairs", () => {
    expect(() => buildDeclaredDescriptor({ name: "goto", args: [42] })).toThrow(
      'Command "goto" is malformed: Argument 42 is neither a name nor a [name, default] pair',
    );
    expect(() => buildDeclaredDescriptor({ name: "goto", args: [[1, 2]] })).toThrow(
      'Command "goto" is malformed: Argument name 1 must be a string',
    );
  });

  it("rejects a name declared twice", () => {
    expect(() => buildDeclaredDescriptor({ name: "dup", args: ["a", ["a", 1]] })).toThrow(
      new SchemaError("dup", 'Argument "a" is declared twice'),
    );
    expect(() => buildDeclaredDescriptor({ name: "dup", args: ["a", "a"] })).toThrow(
      'Command "dup" is malformed: Argument "a" is declared twice',
    );
  });

  it("rejects defaults that are not literals", () => {
    expect(() => buildDeclaredDescriptor({ name: "goto", args: [["b", () => 1]] })).toThrow(SchemaError);
  });

  it("returns a frozen descriptor", () => {
    const descriptor = buildDeclaredDescriptor({ name: "goto", args: ["line", ["column", 0]] });
    expect(Object.isFrozen(descriptor)).toBe(true);
    expect(Object.isFrozen(descriptor.requiredArgs)).toBe(true);
    expect(Object.isFrozen(descriptor.optionalArgs[0])).toBe(true);
  });
});

describe("buildRegisteredDescriptor", () => {
  it("drops a bound receiver and splits defaults from the tail", () => {
    const MoveCommand = commandClass("MoveCommand", {
      params: ["view", "by", "extend"],
      defaults: [false],
      receiver: true,
    });

    expect(buildRegisteredDescriptor(MoveCommand, 0)).toEqual({
      name: "move",
      requiredArgs: ["by"],
      optionalArgs: [["extend", false]],
      doc: undefined,
      hasArbitraryArgs: false,
    });
  });

  it("drops the family's implicit parameters", () => {
    const InsertCommand = commandClass("InsertCommand", {
      params: ["edit", "characters", "times"],
      defaults: [1],
    });

    const descriptor = buildRegisteredDescriptor(InsertCommand, 1);
    expect(descriptor.requiredArgs).toEqual(["characters"]);
    expect(descriptor.optionalArgs).toEqual([["times", 1]]);
  });

  it("ignores defaults that belonged to dropped parameters", () => {
    const PadCommand = commandClass("PadCommand", {
      params: ["edit", "width"],
      defaults: [null, 80],
    });

    const descriptor = buildRegisteredDescriptor(PadCommand, 1);
    expect(descriptor.requiredArgs).toEqual([]);
    expect(descriptor.optionalArgs).toEqual([["width", 80]]);
  });

  it("has no arguments when every parameter is implicit", () => {
    const SaveCommand = commandClass("SaveCommand", { params: ["edit"], defaults: [null] });

    const descriptor = buildRegisteredDescriptor(SaveCommand, 1);
    expect(descriptor.requiredArgs).toEqual([]);
    expect(descriptor.optionalArgs).toEqual([]);
  });

  it("reports a catch-all of named parameters", () => {
    const ExecCommand = commandClass("ExecCommand", { params: ["cmd"], arbitraryArgs: true });
    expect(buildRegisteredDescriptor(ExecCommand, 0).hasArbitraryArgs).toBe(true);
  });

  it("rejects a parameter listed twice", () => {
    const SwapCommand = commandClass("SwapCommand", { params: ["edit", "a", "a"] });

    expect(() => buildRegisteredDescriptor(SwapCommand, 1)).toThrow(
      new SchemaError("swap", 'Argument "a" is declared twice'),
    );
  });

  it("falls back to the class documentation when the run documentation is empty", () => {
    const EmptyRunDoc = commandClass("CCommand", { params: [], doc: "" }, "Class doc");

    expect(buildRegisteredDescriptor(EmptyRunDoc, 0).doc).toBe("Class doc");
  });

  it("prefers the run documentation over the class documentation", () => {
    const withBoth = commandClass("ACommand", { params: [], doc: "Run doc" }, "Class doc");
    const classOnly = commandClass("BCommand", { params: [] }, "Class doc");

    expect(buildRegisteredDescriptor(withBoth, 0).doc).toBe("Run doc");
    expect(buildRegisteredDescriptor(classOnly, 0).doc).toBe("Class doc");
  });
});
