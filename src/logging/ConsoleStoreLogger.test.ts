import { afterEach, describe, expect, it, vi } from "vitest";
import { createConsoleStoreLogger } from "./ConsoleStoreLogger.js";

describe(createConsoleStoreLogger.name, () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes prefixed lines to stderr", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = createConsoleStoreLogger();

    logger.success("Added employee 3");
    logger.warn("No employee with ID 9 to update");

    expect(errorSpy).toHaveBeenCalledTimes(2);
    expect(errorSpy).toHaveBeenNthCalledWith(1, expect.stringContaining("[employee-store]"));
    expect(errorSpy).toHaveBeenNthCalledWith(1, expect.stringContaining("Added employee 3"));
    expect(errorSpy).toHaveBeenNthCalledWith(2, expect.stringContaining("⚠"));
    expect(logSpy).not.toHaveBeenCalled();
  });
});
