import { describe, expect, it } from "vitest";
import { FakeGateway } from "../testing/fakes.js";
import { ProviderCache } from "./provider-cache.js";

describe("ProviderCache", () => {
  it("builds one gateway per provider, key and timeout", () => {
    const built: string[] = [];
    const cache = new ProviderCache((provider, apiKey, timeoutSeconds) => {
      built.push(`${provider}:${apiKey}:${timeoutSeconds}`);
      return new FakeGateway(provider);
    });

    const first = cache.getOrCreate("openai", "test-secret", 60);
    const again = cache.getOrCreate("openai", "test-secret", 60);
    cache.getOrCreate("openai", "test-secret", 30);
    cache.getOrCreate("gemini", "test-secret", 60);

    expect(again).toBe(first);
    expect(built).toEqual(["openai:test-secret:60", "openai:test-secret:30", "gemini:test-secret:60"]);
    expect(cache.size).toBe(3);

    cache.clear();
    expect(cache.size).toBe(0);
    expect(cache.getOrCreate("openai", "test-secret", 60)).not.toBe(first);
  });
});
