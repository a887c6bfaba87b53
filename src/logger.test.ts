import { describe, expect, it } from "vitest";
import { createJsonLogger, createLogger } from "./logger.js";

describe("createLogger", () => {
  it("prints pretty output at the chosen level", () => {
    const logger = createLogger("layout", "info");

    expect(logger.settings.name).toBe("layout");
    expect(logger.settings.type).toBe("pretty");
    expect(logger.settings.minLevel).toBe(3);
  });

  it("hides everything in silent mode", () => {
    const logger = createLogger("layout", "silent");

    expect(logger.settings.type).toBe("hidden");
    expect(logger.settings.minLevel).toBe(7);
  });
});

describe("createJsonLogger", () => {
  it("emits json from debug level by default", () => {
    const logger = createJsonLogger("layout");

    expect(logger.settings.type).toBe("json");
    expect(logger.settings.minLevel).toBe(2);
  });

  it("takes a mode like the pretty logger", () => {
    expect(createJsonLogger("layout", "error").settings.minLevel).toBe(5);
  });
});
