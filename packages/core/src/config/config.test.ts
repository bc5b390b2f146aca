import { describe, it, expect } from "vitest";
import { ConfigError } from "@argloom/sdk";
import { defaultArgConfig, goArgConfig, withArgConfig } from "./arg-config.js";
import { prefixInverseGenerator } from "./inverse.js";
import { loadArgConfig } from "./load.js";

function configErrorOf(input: unknown): ConfigError {
  try {
    loadArgConfig(input);
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error("expected ConfigError");
}

describe("prefixInverseGenerator", () => {
  it("swaps with/without and enable/disable", () => {
    expect(prefixInverseGenerator("with-a")).toBe("without-a");
    expect(prefixInverseGenerator("without-a")).toBe("with-a");
    expect(prefixInverseGenerator("enable-b")).toBe("disable-b");
    expect(prefixInverseGenerator("disable-b")).toBe("enable-b");
  });

  it("adds or strips no-", () => {
    expect(prefixInverseGenerator("color")).toBe("no-color");
    expect(prefixInverseGenerator("no-color")).toBe("color");
  });
});

describe("presets", () => {
  it("default config uses double-dash long options and single-dash shorts", () => {
    expect(defaultArgConfig).toMatchObject({
      longPrefix: "--",
      shortPrefix: "-",
      disableOptionsAfter: "--",
      noOptionsAfterPositional: false,
      inverseGenerator: undefined,
    });
  });

  it("go config has no short options", () => {
    expect(goArgConfig.longPrefix).toBe("-");
    expect(goArgConfig.shortPrefix).toBeUndefined();
    expect(goArgConfig.noOptionsAfterPositional).toBe(true);
  });

  it("withArgConfig overrides without touching the base", () => {
    const config = withArgConfig(defaultArgConfig, { inverseGenerator: prefixInverseGenerator });
    expect(config.inverseGenerator).toBe(prefixInverseGenerator);
    expect(defaultArgConfig.inverseGenerator).toBeUndefined();
    expect(Object.isFrozen(config)).toBe(true);
  });
});

describe("loadArgConfig", () => {
  it("returns the default config for an empty object", () => {
    expect(loadArgConfig({})).toEqual(defaultArgConfig);
  });

  it("layers fields over the go preset", () => {
    const config = loadArgConfig({ preset: "go", noOptionsAfterPositional: false, inverse: "prefix" });
    expect(config.longPrefix).toBe("-");
    expect(config.noOptionsAfterPositional).toBe(false);
    expect(config.inverseGenerator).toBe(prefixInverseGenerator);
  });

  it("null turns the short prefix and separator off", () => {
    const config = loadArgConfig({ shortPrefix: null, disableOptionsAfter: null });
    expect(config.shortPrefix).toBeUndefined();
    expect(config.disableOptionsAfter).toBeUndefined();
  });

  it("rejects unknown keys", () => {
    const err = configErrorOf({ verbose: true });
    expect(err.code).toBe("CONFIG_VALIDATION_ERROR");
    expect(err.message).toContain("Invalid parser config:");
  });

  it("rejects a bad inverse strategy", () => {
    expect(configErrorOf({ inverse: "suffix" }).message).toMatch(/^Invalid parser config: inverse: /);
  });

  it("rejects a short prefix equal to the preset's long prefix", () => {
    expect(configErrorOf({ longPrefix: "-" }).message).toBe(
      'Invalid parser config: short and long option prefixes are both "-"',
    );
  });
});
