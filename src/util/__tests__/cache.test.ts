import { TtlCache } from "../cache";

describe("TtlCache", () => {
  let clock = 0;
  const now = () => clock;

  beforeEach(() => {
    clock = 0;
  });

  it("expires entries after the ttl", () => {
    const cache = new TtlCache<string>({ ttlMs: 1000, now });
    cache.set("a", "alpha");
    clock = 999;
    expect(cache.get("a")).toBe("alpha");
    clock = 1000;
    expect(cache.get("a")).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it("loads once and serves repeated reads from memory", async () => {
    const cache = new TtlCache<number>({ ttlMs: 60_000, now });
    const load = jest.fn(async () => 7);

    await expect(cache.getOrLoad("k", load)).resolves.toBe(7);
    await expect(cache.getOrLoad("k", load)).resolves.toBe(7);
    expect(load).toHaveBeenCalledTimes(1);

    clock = 60_000;
    await cache.getOrLoad("k", load);
    expect(load).toHaveBeenCalledTimes(2);
  });

  it("does not cache failed loads", async () => {
    const cache = new TtlCache<number>({ ttlMs: 60_000, now });
    const load = jest
      .fn<Promise<number>, []>()
      .mockRejectedValueOnce(new Error("boom"))
      .mockResolvedValueOnce(3);

    await expect(cache.getOrLoad("k", load)).rejects.toThrow("boom");
    await expect(cache.getOrLoad("k", load)).resolves.toBe(3);
    expect(load).toHaveBeenCalledTimes(2);
  });

  it("drops expired entries for other keys when storing", () => {
    const cache = new TtlCache<string>({ ttlMs: 1000, now });
    cache.set("AAPL|latest", "a");
    cache.set("MSFT|latest", "m");
    clock = 1000;

    cache.set("NVDA|latest", "n");

    expect(cache.size).toBe(1);
    expect(cache.get("NVDA|latest")).toBe("n");
  });
});
