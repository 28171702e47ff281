import { describe, it, expect } from "vitest";
import { createLogger } from "./logger.js";

function capture(options?: { verbose?: boolean; color?: boolean }) {
  const chunks: string[] = [];
  const stream = { write: (chunk: string) => chunks.push(chunk) };
  const logger = createLogger({ stream, ...options });
  return { logger, text: () => chunks.join("") };
}

describe("createLogger", () => {
  it("writes one line per message", () => {
    const { logger, text } = capture({ color: false });

    logger.info("Attempt 1/3: Delete group");
    logger.warn("⚠️ Rate limit (429) - Retrying in 2s...");
    logger.error("❌ Failed after 3 attempts: Delete group");

    expect(text()).toBe(
      "Attempt 1/3: Delete group\n⚠️ Rate limit (429) - Retrying in 2s...\n❌ Failed after 3 attempts: Delete group\n",
    );
  });

  it("prints debug lines only when verbose", () => {
    const quiet = capture({ color: false });
    quiet.logger.debug("hidden");
    expect(quiet.text()).toBe("");

    const verbose = capture({ color: false, verbose: true });
    verbose.logger.debug("shown");
    expect(verbose.text()).toBe("shown\n");
  });

  it("colors warnings and errors when asked to", () => {
    const { logger, text } = capture({ color: true });

    logger.error("boom");
    expect(text()).toBe("\x1b[31mboom\x1b[0m\n");
  });
});
