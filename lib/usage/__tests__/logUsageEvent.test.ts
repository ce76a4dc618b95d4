import { describe, it, expect, vi, beforeEach } from "vitest";
import { buildUsageIdempotencyKey, logUsageEvent } from "@/lib/usage/logUsageEvent";

const fetchMock = vi.hoisted(() => vi.fn());

vi.mock("@/lib/supabase/serviceClient", async () => {
  const { createClient } = await import("@supabase/supabase-js");
  const client = createClient("https://db.test", "test-service-key", {
    auth: { autoRefreshToken: false, persistSession: false },
    global: { fetch: fetchMock },
  });
  return { getSupabaseServiceClient: () => client };
});

const event = {
  provider: "openai" as const,
  operation: "analyze_item",
  cache_status: "miss" as const,
  images_hash: "f".repeat(64),
  image_count: 2,
  duration_ms: 840,
  success: true,
  idempotency_key: "run-1:openai:analyze_item:ffffffffffffffff:miss",
};

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => {});
});

describe("buildUsageIdempotencyKey", () => {
  it("joins run, provider, operation, short hash and cache status", () => {
    expect(
      buildUsageIdempotencyKey({
        runId: "run-1",
        provider: "openai",
        operation: "analyze_item",
        imagesHash: "0123456789abcdef0123",
        cache_status: "miss",
      })
    ).toBe("run-1:openai:analyze_item:0123456789abcdef:miss");
  });

  it("uses a dash when there is no hash", () => {
    expect(buildUsageIdempotencyKey({ runId: "run-2", provider: "cache", operation: "x", cache_status: "hit" })).toBe(
      "run-2:cache:x:-:hit"
    );
  });
});

describe("logUsageEvent", () => {
  it("upserts the event keyed by idempotency key", async () => {
    fetchMock.mockResolvedValue(new Response(null, { status: 201 }));

    await logUsageEvent(event);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [input, init] = fetchMock.mock.calls[0];
    const url = new URL(String(input));
    expect(url.pathname).toBe("/rest/v1/api_usage_events");
    expect(url.searchParams.get("on_conflict")).toBe("idempotency_key");
    expect(JSON.parse(init.body)).toEqual({
      provider: "openai",
      operation: "analyze_item",
      cache_status: "miss",
      images_hash: "f".repeat(64),
      image_count: 2,
      duration_ms: 840,
      success: true,
      error_code: null,
      meta: {},
      idempotency_key: "run-1:openai:analyze_item:ffffffffffffffff:miss",
    });
    expect(console.error).not.toHaveBeenCalled();
  });

  it("ignores duplicate key violations", async () => {
    fetchMock.mockResolvedValue(
      new Response(JSON.stringify({ code: "23505", message: "duplicate key value" }), { status: 409 })
    );

    await logUsageEvent(event);

    expect(console.error).not.toHaveBeenCalled();
  });

  it("logs other insert errors without throwing", async () => {
    fetchMock.mockResolvedValue(
      new Response(JSON.stringify({ code: "42P01", message: "relation does not exist" }), { status: 404 })
    );

    await expect(logUsageEvent(event)).resolves.toBeUndefined();
    expect(console.error).toHaveBeenCalledWith(
      "USAGE_LOG_INSERT_ERROR",
      expect.objectContaining({ provider: "openai", error: "relation does not exist" })
    );
  });
});
