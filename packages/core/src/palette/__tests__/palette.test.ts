import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  ArgumentSyntaxError,
  ConflictError,
  DispatchError,
  OverflowError,
  SchemaError,
} from "@cmdpal/sdk";
import type { NamedArguments, PaletteSettings } from "@cmdpal/sdk";
import { createMockHost } from "@cmdpal/sdk/testing";
import { DEFAULT_SETTINGS } from "@cmdpal/shared";
import { createCommandPalette, FAMILY_IMPLICIT_PARAMS } from "../palette.js";
import {
  createApplicationCommandPalette,
  createTextCommandPalette,
  createWindowCommandPalette,
} from "../families.js";

class MoveCommand {
  static readonly signature = { params: ["edit", "by", "extend"], defaults: [false], doc: "Move the caret" };
  run(_edit: unknown, _args: NamedArguments): void {}
}

class CloseAllCommand {
  static readonly signature = { params: [] };
  run(_window: unknown, _args: NamedArguments): void {}
}

function settingsWith(overrides: Partial<PaletteSettings>): PaletteSettings {
  return { ...DEFAULT_SETTINGS, ...overrides };
}

describe("CommandPalette", () => {
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    consoleErrorSpy.mockRestore();
  });

  describe("run", () => {
    it("lists, prompts, parses and dispatches", async () => {
      const host = createMockHost({ choices: [{ name: "move" }], inputs: ['"word", extend=true'] });
      host.registerCommand("text", MoveCommand);
      const palette = createTextCommandPalette({ host, ui: host.createUI(), settings: DEFAULT_SETTINGS });

      const outcome = await palette.run();

      expect(outcome).toEqual({ status: "dispatched", command: "move", args: { by: "word", extend: true } });
      expect(host.getListings()).toEqual([[["move", "by, extend", "Move the caret"]]]);
      expect(host.getPrompts()).toEqual([{ label: "by, extend:", initial: "" }]);
      expect(host.getDispatches()).toEqual([
        { family: "text", name: "move", args: { by: "word", extend: true } },
      ]);
    });

    it("dispatches a command without arguments without prompting", async () => {
      const host = createMockHost({ choices: [{ name: "new_file" }] });
      const palette = createWindowCommandPalette({
        host,
        ui: host.createUI(),
        settings: settingsWith({ window_commands: [{ name: "new_file" }] }),
      });

      const outcome = await palette.run();

      expect(outcome).toEqual({ status: "dispatched", command: "new_file", args: {} });
      expect(host.getPrompts()).toEqual([]);
      expect(host.getDispatches()).toEqual([{ family: "window", name: "new_file", args: {} }]);
    });

    it("prompts for a command that only takes arbitrary arguments", async () => {
      const host = createMockHost({ choices: [0], inputs: ['cmd="make"'] });
      const palette = createWindowCommandPalette({
        host,
        ui: host.createUI(),
        settings: settingsWith({ window_commands: [{ name: "exec", has_arbitrary_args: true }] }),
      });

      const outcome = await palette.run();

      expect(host.getPrompts()).toEqual([{ label: "...:", initial: "" }]);
      expect(outcome).toEqual({ status: "dispatched", command: "exec", args: { cmd: "make" } });
    });

    it("stops without side effects when the list is cancelled", async () => {
      const host = createMockHost({ choices: [undefined] });
      host.registerCommand("text", MoveCommand);
      const palette = createTextCommandPalette({ host, ui: host.createUI(), settings: DEFAULT_SETTINGS });

      expect(await palette.run()).toEqual({ status: "cancelled" });
      expect(host.getPrompts()).toEqual([]);
      expect(host.getDispatches()).toEqual([]);
      expect(host.getErrors()).toEqual([]);
    });

    it("stops without side effects when the prompt is cancelled", async () => {
      const host = createMockHost({ choices: [0], inputs: [undefined] });
      host.registerCommand("text", MoveCommand);
      const palette = createTextCommandPalette({ host, ui: host.createUI(), settings: DEFAULT_SETTINGS });

      expect(await palette.run()).toEqual({ status: "cancelled" });
      expect(host.getDispatches()).toEqual([]);
    });

    it("treats an out-of-range selection as a cancel", async () => {
      const host = createMockHost({ choices: [5] });
      host.registerCommand("window", CloseAllCommand);
      const palette = createWindowCommandPalette({ host, ui: host.createUI(), settings: DEFAULT_SETTINGS });

      expect(await palette.run()).toEqual({ status: "cancelled" });
      expect(host.getDispatches()).toEqual([]);
    });

    it("rebuilds the catalog on every run", async () => {
      const host = createMockHost();
      const palette = createWindowCommandPalette({ host, ui: host.createUI(), settings: DEFAULT_SETTINGS });

      await palette.run();
      host.registerCommand("window", CloseAllCommand);
      await palette.run();

      expect(host.getListings()).toEqual([[], [["close_all", "No arguments"]]]);
    });

    it("fails the whole listing on a malformed declared command", async () => {
      const host = createMockHost({ choices: [0] });
      const palette = createApplicationCommandPalette({
        host,
        ui: host.createUI(),
        settings: settingsWith({ application_commands: [{ name: "bad", args: [["a", 1], "b"] }] }),
      });

      await expect(palette.run()).rejects.toBeInstanceOf(SchemaError);
      expect(host.getListings()).toEqual([]);
    });
  });

  describe("argument errors", () => {
    it("rejects unparsable text and shows the reason", async () => {
      const host = createMockHost({ choices: [0], inputs: ["by=1, by=2"] });
      host.registerCommand("text", MoveCommand);
      const palette = createTextCommandPalette({ host, ui: host.createUI(), settings: DEFAULT_SETTINGS });

      const outcome = await palette.run();

      expect(outcome.status).toBe("rejected");
      expect(outcome.status === "rejected" && outcome.error).toBeInstanceOf(ArgumentSyntaxError);
      expect(host.getErrors()).toEqual(['Repeated name "by"']);
      expect(host.getDispatches()).toEqual([]);
    });

    it("rejects a positional value colliding with a named one", async () => {
      const host = createMockHost({ choices: [0], inputs: ['"line", by="word"'] });
      host.registerCommand("text", MoveCommand);
      const palette = createTextCommandPalette({ host, ui: host.createUI(), settings: DEFAULT_SETTINGS });

      const outcome = await palette.run();

      expect(outcome).toEqual({ status: "rejected", command: "move", error: new ConflictError("by") });
      expect(host.getErrors()).toEqual(['Repeated value for argument "by"']);
    });

    it("rejects too many positional values", async () => {
      const host = createMockHost({ choices: [0], inputs: ["1, true, 3"] });
      host.registerCommand("text", MoveCommand);
      const palette = createTextCommandPalette({ host, ui: host.createUI(), settings: DEFAULT_SETTINGS });

      const outcome = await palette.run();

      expect(outcome.status === "rejected" && outcome.error).toBeInstanceOf(OverflowError);
      expect(host.getErrors()).toEqual(["Too many positional arguments: expected at most 2, got 3"]);
    });
  });

  describe("dispatch failures", () => {
    it("shows the failure and propagates a DispatchError", async () => {
      const host = createMockHost({ choices: [0] });
      host.registerCommand("window", CloseAllCommand);
      host.failCommand("close_all", new Error("unsaved changes"));
      const palette = createWindowCommandPalette({ host, ui: host.createUI(), settings: DEFAULT_SETTINGS });

      await expect(palette.run()).rejects.toBeInstanceOf(DispatchError);
      expect(host.getErrors()).toEqual(["Command caused an error: unsaved changes"]);
    });
  });

  describe("invoke", () => {
    it("parses and dispatches text for a listed entry", async () => {
      const host = createMockHost();
      host.registerCommand("text", MoveCommand);
      const palette = createTextCommandPalette({ host, ui: host.createUI(), settings: DEFAULT_SETTINGS });
      const [entry] = palette.list();

      const outcome = await palette.invoke(entry, "");

      expect(outcome).toEqual({ status: "dispatched", command: "move", args: {} });
    });
  });

  describe("families", () => {
    it("targets the family named by each adapter", () => {
      const host = createMockHost();
      const ui = host.createUI();

      expect(createTextCommandPalette({ host, ui, settings: DEFAULT_SETTINGS }).family).toBe("text");
      expect(createWindowCommandPalette({ host, ui, settings: DEFAULT_SETTINGS }).family).toBe("window");
      expect(createApplicationCommandPalette({ host, ui, settings: DEFAULT_SETTINGS }).family).toBe("application");
    });

    it("drops the edit context only for text commands", () => {
      const host = createMockHost();
      host.registerCommand("text", MoveCommand);
      host.registerCommand("window", MoveCommand);
      const ui = host.createUI();

      const [text] = createCommandPalette({ family: "text", host, ui, settings: DEFAULT_SETTINGS }).list();
      const [window] = createCommandPalette({ family: "window", host, ui, settings: DEFAULT_SETTINGS }).list();

      expect(FAMILY_IMPLICIT_PARAMS).toEqual({ text: 1, window: 0, application: 0 });
      expect(text.descriptor.requiredArgs).toEqual(["by"]);
      expect(window.descriptor.requiredArgs).toEqual(["edit", "by"]);
    });
  });
});
