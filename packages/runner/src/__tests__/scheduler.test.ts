import { describe, it, expect, vi, beforeEach } from "vitest";
import { loadEnvConfig, type RunSummary } from "@weekly-digest/shared";
import { createLogger } from "../logger.js";
import { startScheduler } from "../scheduler.js";

const cronMock = vi.hoisted(() => ({
  validate: vi.fn<(expr: string) => boolean>(),
  schedule: vi.fn(),
  stop: vi.fn(),
}));

vi.mock("node-cron", () => ({
  default: {
    validate: cronMock.validate,
    schedule: cronMock.schedule,
  },
}));

const SUMMARY: RunSummary = {
  mode: "surnames",
  fetched_count: 1,
  recent_count: 1,
  listed_count: 1,
  pdf: "out/digest_2024-03-14.pdf",
};

function setup() {
  const lines: Record<string, unknown>[] = [];
  const logger = createLogger({
    sink: { write: (line: string) => lines.push(JSON.parse(line)) },
  });
  const env = loadEnvConfig({ CRON_ENABLED: "true" });
  return { lines, logger, env };
}

/** The callback handed to cron.schedule by the last startScheduler call */
function scheduledTick(): () => Promise<void> {
  const call = cronMock.schedule.mock.calls.at(-1);
  const tick: unknown = call?.[1];
  if (typeof tick !== "function") throw new Error("cron.schedule was not called");
  return async () => {
    await tick();
  };
}

describe("startScheduler", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    cronMock.validate.mockReturnValue(true);
    cronMock.schedule.mockReturnValue({ stop: cronMock.stop });
  });

  it("schedules on the configured expression and time zone", () => {
    const { logger, env } = setup();
    startScheduler({ env, logger }, async () => SUMMARY);

    expect(cronMock.schedule).toHaveBeenCalledWith("0 9 * * 4", expect.any(Function), {
      timezone: "Asia/Tokyo",
    });
  });

  it("rejects an invalid expression", () => {
    cronMock.validate.mockReturnValue(false);
    const { logger } = setup();
    const env = loadEnvConfig({ CRON_SCHEDULE: "every thursday" });

    expect(() => startScheduler({ env, logger }, async () => SUMMARY)).toThrow(
      'Invalid CRON_SCHEDULE: "every thursday"',
    );
    expect(cronMock.schedule).not.toHaveBeenCalled();
  });

  it("logs a failed run and stays scheduled", async () => {
    const { logger, env, lines } = setup();
    const run = vi
      .fn<() => Promise<RunSummary>>()
      .mockRejectedValueOnce(new Error("arXiv down"))
      .mockResolvedValueOnce(SUMMARY);
    startScheduler({ env, logger }, run);
    const tick = scheduledTick();

    await tick();
    await tick();

    expect(run).toHaveBeenCalledTimes(2);
    const failed = lines.find((l) => l.msg === "Cron job failed: weekly_digest");
    expect(failed?.error).toBe("arXiv down");
    expect(lines.some((l) => l.msg === "Cron job completed: weekly_digest")).toBe(true);
  });

  it("skips a tick while the previous run is still going", async () => {
    const { logger, env, lines } = setup();
    let release: (summary: RunSummary) => void = () => undefined;
    const run = vi.fn<() => Promise<RunSummary>>(
      () => new Promise<RunSummary>((resolve) => {
        release = resolve;
      }),
    );
    startScheduler({ env, logger }, run);
    const tick = scheduledTick();

    const first = tick();
    await tick();
    release(SUMMARY);
    await first;

    expect(run).toHaveBeenCalledTimes(1);
    expect(lines.some((l) => l.msg === "Previous digest run still in progress, skipping tick")).toBe(true);
  });

  it("stops the underlying task", () => {
    const { logger, env, lines } = setup();
    const handle = startScheduler({ env, logger }, async () => SUMMARY);
    handle.stop();

    expect(cronMock.stop).toHaveBeenCalledTimes(1);
    expect(lines.at(-1)?.msg).toBe("Cron scheduler stopped");
  });
});
