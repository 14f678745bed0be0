import assert from "assert/strict";
import { test } from "node:test";
import { GenerationError, ProviderTimeoutError } from "../modules/errors/errors";
import { backoffDelay, callWithPolicy, RetriesExhaustedError, withTimeout } from "../modules/llm/call.policy";
import { RateLimiter } from "../modules/llm/rate.limiter";
import { Generator } from "../modules/rag/generator";
import { NO_RETRY_POLICY, noSleep, ScriptedBackend } from "./fakes";

const RETRY_POLICY = { timeoutMs: 1_000, maxRetries: 2, baseDelayMs: 100, maxDelayMs: 150 };

test("backoff doubles per attempt up to the cap", () => {
  assert.equal(backoffDelay(RETRY_POLICY, 0), 100);
  assert.equal(backoffDelay(RETRY_POLICY, 1), 150);
  assert.equal(backoffDelay({ ...RETRY_POLICY, maxDelayMs: 10_000 }, 3), 800);
});

test("retries with backoff until the call succeeds", async () => {
  const delays: number[] = [];
  let calls = 0;

  const result = await callWithPolicy(
    async () => {
      calls++;
      if (calls < 3) throw new Error(`failure ${calls}`);
      return "ok";
    },
    RETRY_POLICY,
    {
      provider: "fake:model",
      sleep: async (ms) => {
        delays.push(ms);
      },
    }
  );

  assert.equal(result, "ok");
  assert.equal(calls, 3);
  assert.deepEqual(delays, [100, 150]);
});

test("gives up after maxRetries + 1 attempts", async () => {
  await assert.rejects(
    callWithPolicy(
      async () => {
        throw new Error("boom");
      },
      { ...RETRY_POLICY, maxRetries: 1 },
      { provider: "fake:model", sleep: noSleep }
    ),
    (error: unknown) => {
      assert.ok(error instanceof RetriesExhaustedError);
      assert.equal(error.attempts, 2);
      assert.equal(error.message, "Gave up after 2 attempt(s): boom");
      return true;
    }
  );
});

test("a call that never answers times out", async () => {
  await assert.rejects(
    withTimeout(() => new Promise<string>(() => {}), 10, "fake:model"),
    (error: unknown) => {
      assert.ok(error instanceof ProviderTimeoutError);
      assert.equal(error.message, "fake:model did not respond within 10ms");
      return true;
    }
  );
});

test("the rate limiter spaces call starts evenly", async () => {
  const waits: number[] = [];
  const limiter = new RateLimiter(
    60,
    () => 0,
    async (ms) => {
      waits.push(ms);
    }
  );

  await limiter.acquire();
  await limiter.acquire();
  await limiter.acquire();
  assert.deepEqual(waits, [1000, 2000]);
});

test("a zero rate limit never waits", async () => {
  const waits: number[] = [];
  const limiter = new RateLimiter(0, () => 0, async (ms) => {
    waits.push(ms);
  });
  await limiter.acquire();
  await limiter.acquire();
  assert.deepEqual(waits, []);
});

test("the generator retries transient backend failures", async () => {
  const backend = new ScriptedBackend([new Error("503 busy"), "The refund window is 30 days."]);
  const generator = new Generator({
    backend,
    policy: { ...NO_RETRY_POLICY, maxRetries: 1 },
    sleep: noSleep,
  });

  const result = await generator.generate("prompt", { model: "llama3.2", temperature: 0.1 });

  assert.equal(result.text, "The refund window is 30 days.");
  assert.deepEqual(result.usage, { promptTokens: 10, completionTokens: 5 });
  assert.equal(result.model, "llama3.2");
  assert.equal(backend.requests.length, 2);
  assert.equal(backend.requests[1].temperature, 0.1);
});

test("per-call maxRetries overrides the generator policy", async () => {
  const backend = new ScriptedBackend([], new Error("down"));
  const generator = new Generator({
    backend,
    policy: { ...NO_RETRY_POLICY, maxRetries: 3 },
    sleep: noSleep,
  });

  await assert.rejects(generator.generate("prompt", { model: "m", maxRetries: 0 }), (error: unknown) => {
    assert.ok(error instanceof GenerationError);
    assert.equal(error.attempts, 1);
    assert.equal(error.message, "Generation with m failed: Gave up after 1 attempt(s): down");
    return true;
  });
  assert.equal(backend.requests.length, 1);
});
