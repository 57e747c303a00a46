import { describe, it, expect, vi } from "vitest";
import { createActor, waitFor } from "xstate";
import type { RetryContext, RetryServices } from "../src/machine.js";
import {
  buildReport,
  cleanupTargets,
  createRetryMachine,
} from "../src/machine.js";
import type { BotResponse } from "../src/response.js";
import {
  EXHAUSTED_DETAIL,
  POST_FAILED_DETAIL,
  finalizeResponse,
} from "../src/response.js";
import { createRecordingLogger, makeResponse } from "./helpers.js";

function context(overrides: Partial<RetryContext> = {}): RetryContext {
  return {
    triggerBody: "@bot go",
    responder: "bot",
    maxRetries: 2,
    retryDelayMs: 5,
    autoDeleteOnFailure: true,
    attempt: 1,
    triggerId: null,
    watermark: 0,
    response: null,
    lastResponse: null,
    attempts: [],
    ...overrides,
  };
}

function judged(body: string, passed: boolean, id = 2): BotResponse {
  return finalizeResponse(makeResponse(body, id), {
    passed,
    failures: passed ? [] : ["Validator stub failed"],
  });
}

describe("cleanupTargets", () => {
  it("should list the trigger before the reply", () => {
    expect(
      cleanupTargets(context({ triggerId: 1, response: makeResponse("x", 2) })),
    ).toEqual([1, 2]);
  });

  it("should be empty when nothing was posted", () => {
    expect(cleanupTargets(context())).toEqual([]);
  });
});

describe("buildReport", () => {
  const now = new Date(42);

  it("should prefer a passing response", () => {
    const good = judged("ok", true, 4);
    const report = buildReport(
      context({ response: good, lastResponse: good }),
      now,
    );
    expect(report.response).toBe(good);
  });

  it("should fall back to the last observed response", () => {
    const bad = judged("bad", false);
    expect(buildReport(context({ lastResponse: bad }), now).response).toBe(bad);
  });

  it("should name a post failure when the last attempt could not post", () => {
    const report = buildReport(
      context({
        attempts: [
          { attempt: 1, triggerId: 1, response: null, outcome: "timeout", deleted: [] },
          { attempt: 2, triggerId: null, response: null, outcome: "post_failed", deleted: [] },
        ],
      }),
      now,
    );
    expect(report.response.error).toBe(POST_FAILED_DETAIL);
    expect(report.response.createdAt).toBe(now);
  });

  it("should report exhaustion otherwise", () => {
    const report = buildReport(
      context({
        attempts: [
          { attempt: 1, triggerId: null, response: null, outcome: "post_failed", deleted: [] },
          { attempt: 2, triggerId: 2, response: null, outcome: "timeout", deleted: [] },
        ],
      }),
      now,
    );
    expect(report.response.error).toBe(EXHAUSTED_DETAIL);
  });
});

describe("createRetryMachine", () => {
  function stubServices(overrides: Partial<RetryServices> = {}) {
    const calls: string[] = [];
    const { logger, messages } = createRecordingLogger();
    let nextId = 10;

    const services: RetryServices = {
      postTrigger: async (body) => {
        calls.push(`post:${body}`);
        return nextId++;
      },
      waitForResponse: async (watermark) => {
        calls.push(`wait:${watermark}`);
        return null;
      },
      validate: (response) =>
        finalizeResponse(response, { passed: true, failures: [] }),
      cleanUp: async (ids) => {
        calls.push(`cleanUp:${ids.join(",")}`);
        return ids;
      },
      sleep: async (ms) => {
        calls.push(`sleep:${ms}`);
      },
      logger,
      ...overrides,
    };

    return { services, calls, messages };
  }

  async function runMachine(services: RetryServices, maxRetries = 2) {
    const actor = createActor(createRetryMachine(services), {
      input: {
        triggerBody: "@bot go",
        responder: "bot",
        maxRetries,
        retryDelayMs: 5,
        autoDeleteOnFailure: true,
      },
    });
    actor.start();
    const snapshot = await waitFor(actor, (s) => s.status === "done");
    return snapshot;
  }

  it("should run attempts strictly one after another", async () => {
    const { services, calls } = stubServices();

    const snapshot = await runMachine(services);

    expect(snapshot.value).toBe("exhausted");
    expect(calls).toEqual([
      "post:@bot go",
      "wait:10",
      "cleanUp:10",
      "sleep:5",
      "post:@bot go",
      "wait:11",
      "cleanUp:11",
    ]);
  });

  it("should wait after the trigger that was actually posted", async () => {
    const postTrigger = vi
      .fn<RetryServices["postTrigger"]>()
      .mockRejectedValueOnce(new Error("down"))
      .mockResolvedValueOnce(21);
    const { services, calls } = stubServices({ postTrigger });

    const snapshot = await runMachine(services);

    expect(calls).toEqual(["sleep:5", "wait:21", "cleanUp:21"]);
    expect(snapshot.context.attempts.map((a) => a.triggerId)).toEqual([
      null,
      21,
    ]);
  });

  it("should stop as soon as a response passes", async () => {
    const waitForResponse = vi
      .fn<RetryServices["waitForResponse"]>()
      .mockResolvedValueOnce(null)
      .mockResolvedValueOnce(makeResponse("done", 12));
    const { services, messages } = stubServices({ waitForResponse });

    const snapshot = await runMachine(services, 3);

    expect(snapshot.value).toBe("passed");
    expect(snapshot.context.attempts.map((a) => a.outcome)).toEqual([
      "timeout",
      "passed",
    ]);
    expect(snapshot.context.response?.passed).toBe(true);
    expect(messages("info")).toEqual([
      "Test attempt 1/3",
      "Retrying in 0.005s",
      "Test attempt 2/3",
      "Test passed",
    ]);
  });

  it("should record a failing wait as a timeout", async () => {
    const { services, messages } = stubServices({
      waitForResponse: async () => {
        throw new Error("socket closed");
      },
    });

    const snapshot = await runMachine(services, 1);

    expect(snapshot.context.attempts).toEqual([
      { attempt: 1, triggerId: 10, response: null, outcome: "timeout", deleted: [10] },
    ]);
    expect(messages("error")).toEqual([
      "Waiting for a response failed: socket closed",
      "Test failed after 1 attempts",
    ]);
  });

  it("should carry on when cleanup rejects", async () => {
    const { services, messages } = stubServices({
      cleanUp: async () => {
        throw new Error("nope");
      },
    });

    const snapshot = await runMachine(services, 1);

    expect(snapshot.value).toBe("exhausted");
    expect(snapshot.context.attempts[0]?.deleted).toEqual([]);
    expect(messages("error")).toEqual([
      "Cleanup failed: nope",
      "Test failed after 1 attempts",
    ]);
  });

  it("should keep the failed response across later attempts", async () => {
    const waitForResponse = vi
      .fn<RetryServices["waitForResponse"]>()
      .mockResolvedValueOnce(makeResponse("bad", 11))
      .mockResolvedValueOnce(null);
    const { services } = stubServices({
      waitForResponse,
      validate: (response) =>
        finalizeResponse(response, {
          passed: false,
          failures: ["Validator stub failed"],
        }),
    });

    const snapshot = await runMachine(services);

    expect(snapshot.context.lastResponse?.id).toBe(11);
    expect(snapshot.context.attempts.map((a) => a.deleted)).toEqual([
      [10, 11],
      [11],
    ]);
  });
});
