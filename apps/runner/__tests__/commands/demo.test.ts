import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { ArgParsingError } from "@argloom/sdk";
import { createBufferSink, goArgConfig } from "@argloom/core";
import { DemoApp } from "../../src/commands/app.js";

class ExitSignal extends Error {
  constructor(readonly code: number) {
    super(`exit ${code}`);
  }
}

const exitSpy = () =>
  vi.fn((code: number): never => {
    throw new ExitSignal(code);
  });

function silenceStdout() {
  return vi.spyOn(console, "log").mockImplementation(() => {});
}

describe("DemoApp", () => {
  let consoleSpy: ReturnType<typeof silenceStdout>;

  beforeEach(() => {
    consoleSpy = silenceStdout();
  });

  afterEach(() => {
    consoleSpy.mockRestore();
  });

  const printed = () => consoleSpy.mock.calls.map((call) => call.join(" "));

  describe("add", () => {
    it("prints the sum", async () => {
      await new DemoApp().runApp(["add", "1", "2", "3"]);
      expect(printed()).toEqual(["6"]);
    });

    it("prints the expression when verbose", async () => {
      await new DemoApp().runApp(["-v", "add", "2", "3"]);
      expect(printed()).toEqual(["2 + 3 = 5"]);
    });

    it("accepts app options after the command", async () => {
      await new DemoApp().runApp(["add", "2", "-v", "3"]);
      expect(printed()).toEqual(["2 + 3 = 5"]);
    });

    it("requires at least one number", async () => {
      await expect(new DemoApp().runApp(["add"])).rejects.toThrow(
        "Missing required positional argument(s): numbers",
      );
    });

    it("rejects non-integers", async () => {
      await expect(new DemoApp().runApp(["add", "1", "x"])).rejects.toThrow(
        "Failed to parse numbers[=x]: Invalid int",
      );
      expect(printed()).toEqual([]);
    });
  });

  describe("echo", () => {
    it("repeats the line", async () => {
      await new DemoApp().runApp(["echo", "-c", "2", "hello", "world"]);
      expect(printed()).toEqual(["hello world", "hello world"]);
    });

    it("treats everything after the first word as words", async () => {
      await new DemoApp().runApp(["echo", "-u", "hi", "-c", "3"]);
      expect(printed()).toEqual(["HI -C 3"]);
    });

    it("joins with the separator and honours the inverse flag", async () => {
      await new DemoApp().runApp(["echo", "-u", "--lower", "--separator=,", "a", "b"]);
      expect(printed()).toEqual(["a,b"]);
    });

    it("prints an empty line without words", async () => {
      await new DemoApp().runApp(["echo"]);
      expect(printed()).toEqual([""]);
    });

    it("rejects a count below one", async () => {
      await expect(new DemoApp().runApp(["echo", "--count=0", "x"])).rejects.toThrow(
        "Failed to parse count[=0]: Must be >0",
      );
    });
  });

  describe("version", () => {
    it("prints the package version", async () => {
      await new DemoApp().runApp(["version"]);
      expect(printed()).toEqual(["argloom-demo v0.4.0"]);
    });

    it("adds runtime details when verbose", async () => {
      await new DemoApp().runApp(["version", "-v"]);
      expect(printed()).toEqual([
        "argloom-demo v0.4.0",
        `Node.js ${process.version}`,
        `Platform: ${process.platform} ${process.arch}`,
      ]);
    });
  });

  describe("errors and help", () => {
    it("requires a command", async () => {
      await expect(new DemoApp().runApp([])).rejects.toBeInstanceOf(ArgParsingError);
    });

    it("prints the error and short usage on bad input", async () => {
      const stderr = createBufferSink();
      const exit = exitSpy();

      await expect(new DemoApp().runAppOrQuit(["deploy"], { stderr, exit })).rejects.toThrow("exit 1");

      expect(exit).toHaveBeenCalledWith(1);
      expect(stderr.text()).toBe(
        "Unknown command: deploy\n" +
          "Usage: argloom-demo <command> [-h|--help[=true|false]] [-v|--verbose[=true|false]]\n",
      );
    });

    it("prints the full usage of the selected command", async () => {
      const stdout = createBufferSink();
      const exit = exitSpy();

      await expect(new DemoApp().runApp(["version", "--help"], { stdout, exit })).rejects.toThrow("exit 0");

      expect(stdout.text()).toBe(
        [
          "Usage: argloom-demo version [-h|--help[=true|false]] [-v|--verbose[=true|false]]",
          "",
          "Small tools that exercise the argloom parser.",
          "",
          "Options:",
          "",
          "  -h, --help[=true|false]     Show this help",
          "  -v, --verbose[=true|false]  Print more detail, repeat for even more",
          "",
          "Set ARGLOOM_CONFIG to a JSON file to change the option syntax.",
          "",
          "",
        ].join("\n"),
      );
      expect(printed()).toEqual([]);
    });

    it("parses with a custom config", async () => {
      await new DemoApp(goArgConfig).runApp(["-verbose", "add", "4", "5"]);
      expect(printed()).toEqual(["4 + 5 = 9"]);
    });
  });
});
