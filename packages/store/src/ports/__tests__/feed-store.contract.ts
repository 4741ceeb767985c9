import {
  insertUnchecked,
  summarize,
  timestamps,
  uniqueImageFeed,
} from "../../tests/utils/feed-test-helpers"
import type { CachedFeed, FeedImageRecord } from "../feed-image"
import type { FeedStoreResult } from "../feed-store-result"
import {
  type FailableDeleteHarness,
  type FailableInsertHarness,
  type FailableRetrieveHarness,
  type FeedStoreHarness,
  useHarness,
} from "./feed-store-harness"

export function describeFeedStoreContract(h: FeedStoreHarness) {
  describe(`FeedStore contract: ${h.name}`, () => {
    useHarness(h)

    describe("retrieve", () => {
      it("delivers empty on an empty cache", async () => {
        const store = await h.makeStore()

        expect(await store.retrieve()).toEqual({ kind: "empty" })
      })

      it("has no side effects on an empty cache", async () => {
        const store = await h.makeStore()

        expect(await store.retrieve()).toEqual({ kind: "empty" })
        expect(await store.retrieve()).toEqual({ kind: "empty" })
      })

      it("delivers the inserted feed and timestamp", async () => {
        const store = await h.makeStore()
        const feed = uniqueImageFeed(3)
        const timestamp = timestamps.t0()

        await store.insert(feed, timestamp)

        expect(await store.retrieve()).toEqual({ kind: "found", feed, timestamp })
      })

      it("has no side effects on a non-empty cache", async () => {
        const store = await h.makeStore()
        const feed = uniqueImageFeed()
        const timestamp = timestamps.t0()

        await store.insert(feed, timestamp)

        expect(await store.retrieve()).toEqual({ kind: "found", feed, timestamp })
        expect(await store.retrieve()).toEqual({ kind: "found", feed, timestamp })
      })

      it("keeps record order and every field", async () => {
        const store = await h.makeStore()
        const feed: FeedImageRecord[] = [
          { id: "z", description: null, location: null, url: "https://x/z.png" },
          { id: "a", description: "first", location: "Lisbon", url: "https://x/a.png" },
          { id: "m", description: "", location: "Oslo", url: "https://x/m.png" },
        ]

        await store.insert(feed, timestamps.t0())

        const result = await store.retrieve()
        expect(result.kind === "found" && result.feed.map((r) => r.id)).toEqual(["z", "a", "m"])
        expect(result).toEqual({ kind: "found", feed, timestamp: timestamps.t0() })
      })
    })

    describe("insert", () => {
      it("succeeds on an empty cache", async () => {
        const store = await h.makeStore()

        expect(await store.insert(uniqueImageFeed(), timestamps.t0())).toEqual({
          kind: "inserted",
        })
      })

      it("succeeds on a non-empty cache", async () => {
        const store = await h.makeStore()

        await store.insert(uniqueImageFeed(), timestamps.t0())

        expect(await store.insert(uniqueImageFeed(), timestamps.t1())).toEqual({
          kind: "inserted",
        })
      })

      it("overrides the previously inserted cache", async () => {
        const store = await h.makeStore()
        const latestFeed = uniqueImageFeed()
        const latestTimestamp = timestamps.t1()

        await store.insert(uniqueImageFeed(), timestamps.t0())
        await store.insert(latestFeed, latestTimestamp)

        expect(await store.retrieve()).toEqual({
          kind: "found",
          feed: latestFeed,
          timestamp: latestTimestamp,
        })
      })

      it("stores an empty feed as an occupied slot", async () => {
        const store = await h.makeStore()

        await store.insert([], timestamps.t1())

        expect(await store.retrieve()).toEqual({
          kind: "found",
          feed: [],
          timestamp: timestamps.t1(),
        })
      })

      it("persists the feed as it was when insert was called", async () => {
        const store = await h.makeStore()
        const record: { id: string; description: string | null; location: string | null; url: string } = {
          id: "snap-1",
          description: "before",
          location: null,
          url: "https://x/snap.png",
        }
        const feed = [record]
        const timestamp = timestamps.t0()

        const pending = store.insert(feed, timestamp)
        record.description = "after"
        feed.push({ id: "snap-2", description: null, location: null, url: "https://x/2.png" })
        timestamp.setTime(0)

        expect(await pending).toEqual({ kind: "inserted" })
        expect(await store.retrieve()).toEqual({
          kind: "found",
          feed: [{ id: "snap-1", description: "before", location: null, url: "https://x/snap.png" }],
          timestamp: timestamps.t0(),
        })
      })

      it("rejects an invalid record with invalid_feed and leaves the slot as it was", async () => {
        const store = await h.makeStore()
        const feed = uniqueImageFeed()

        await store.insert(feed, timestamps.t0())

        const invalid = [{ id: "bad", description: null, location: null, url: "not a url" }]
        const result = await store.insert(invalid, timestamps.t1())

        expect(summarize(result)).toEqual({ kind: "failure", code: "invalid_feed" })
        expect(await store.retrieve()).toEqual({ kind: "found", feed, timestamp: timestamps.t0() })
      })

      it("settles with invalid_feed instead of throwing on a feed that is not an array", async () => {
        const store = await h.makeStore()
        const feed = uniqueImageFeed()

        await store.insert(feed, timestamps.t0())

        const result = await insertUnchecked(store, null, timestamps.t1())

        expect(summarize(result)).toEqual({ kind: "failure", code: "invalid_feed" })
        expect(await store.retrieve()).toEqual({ kind: "found", feed, timestamp: timestamps.t0() })
      })

      it("settles with invalid_feed instead of throwing on a timestamp that is not a Date", async () => {
        const store = await h.makeStore()

        const results = await Promise.all([
          insertUnchecked(store, [], "2026"),
          insertUnchecked(store, [], new Date(Number.NaN)),
          store.retrieve(),
        ])

        expect(results.map(summarize)).toEqual([
          { kind: "failure", code: "invalid_feed" },
          { kind: "failure", code: "invalid_feed" },
          { kind: "empty" },
        ])
      })
    })

    describe("deleteCachedFeed", () => {
      it("succeeds on an empty cache", async () => {
        const store = await h.makeStore()

        expect(await store.deleteCachedFeed()).toEqual({ kind: "deleted" })
      })

      it("has no side effects on an empty cache", async () => {
        const store = await h.makeStore()

        await store.deleteCachedFeed()

        expect(await store.retrieve()).toEqual({ kind: "empty" })
      })

      it("succeeds on a non-empty cache", async () => {
        const store = await h.makeStore()

        await store.insert(uniqueImageFeed(), timestamps.t0())

        expect(await store.deleteCachedFeed()).toEqual({ kind: "deleted" })
      })

      it("empties a previously inserted cache", async () => {
        const store = await h.makeStore()

        await store.insert(uniqueImageFeed(), timestamps.t0())
        await store.deleteCachedFeed()

        expect(await store.retrieve()).toEqual({ kind: "empty" })
      })
    })

    describe("concurrent callers", () => {
      it("completes side effects in submission order", async () => {
        const store = await h.makeStore()
        const completed: string[] = []

        const ops = [
          store.insert(uniqueImageFeed(), timestamps.t0()).then(() => completed.push("insert-1")),
          store.deleteCachedFeed().then(() => completed.push("delete")),
          store.insert(uniqueImageFeed(), timestamps.t1()).then(() => completed.push("insert-2")),
        ]

        await Promise.all(ops)

        expect(completed).toEqual(["insert-1", "delete", "insert-2"])
      })

      it("ends in the state of running every operation one after another", async () => {
        const store = await h.makeStore()
        const first = uniqueImageFeed()
        const second = uniqueImageFeed(1)

        const results: Promise<FeedStoreResult>[] = [
          store.retrieve(),
          store.insert(first, timestamps.t0()),
          store.retrieve(),
          store.deleteCachedFeed(),
          store.retrieve(),
          store.insert(second, timestamps.t1()),
          store.retrieve(),
        ]

        expect(await Promise.all(results)).toEqual([
          { kind: "empty" },
          { kind: "inserted" },
          { kind: "found", feed: first, timestamp: timestamps.t0() },
          { kind: "deleted" },
          { kind: "empty" },
          { kind: "inserted" },
          { kind: "found", feed: second, timestamp: timestamps.t1() },
        ])
      })
    })

    it("replaces a feed with an empty feed", async () => {
      const store = await h.makeStore()
      const feed = [{ id: "A", description: null, location: "NYC", url: "https://x/a.png" }]

      await store.insert(feed, timestamps.t0())
      expect(await store.retrieve()).toEqual({ kind: "found", feed, timestamp: timestamps.t0() })

      await store.insert([], timestamps.t1())
      expect(await store.retrieve()).toEqual({
        kind: "found",
        feed: [],
        timestamp: timestamps.t1(),
      })
    })
  })
}

export function describeFailableRetrieveContract(h: FailableRetrieveHarness) {
  describe(`FeedStore failable retrieve contract: ${h.name}`, () => {
    useHarness(h)

    it("delivers a failure on retrieval error", async () => {
      const { store } = await h.makeCorruptedStore()

      expect(summarize(await store.retrieve())).toEqual({
        kind: "failure",
        code: "cache_corrupted",
      })
    })

    it("has no side effects on failure", async () => {
      const { store, readRaw } = await h.makeCorruptedStore()
      const before = await readRaw()

      expect(summarize(await store.retrieve())).toEqual({
        kind: "failure",
        code: "cache_corrupted",
      })
      expect(summarize(await store.retrieve())).toEqual({
        kind: "failure",
        code: "cache_corrupted",
      })
      expect(await readRaw()).toEqual(before)
    })

    it("recovers once a new feed is inserted", async () => {
      const { store } = await h.makeCorruptedStore()
      const feed = uniqueImageFeed()

      expect(await store.insert(feed, timestamps.t0())).toEqual({ kind: "inserted" })
      expect(await store.retrieve()).toEqual({ kind: "found", feed, timestamp: timestamps.t0() })
    })

    it("clears the corrupted slot on delete", async () => {
      const { store, readRaw } = await h.makeCorruptedStore()

      expect(await store.deleteCachedFeed()).toEqual({ kind: "deleted" })
      expect(await store.retrieve()).toEqual({ kind: "empty" })
      expect(await readRaw()).toBeNull()
    })
  })
}

export function describeFailableInsertContract(h: FailableInsertHarness) {
  describe(`FeedStore failable insert contract: ${h.name}`, () => {
    useHarness(h)

    it("delivers an error on insertion error", async () => {
      const store = await h.makeUnwritableStore(cachedSeed())

      expect(summarize(await store.insert(uniqueImageFeed(), timestamps.t1()))).toEqual({
        kind: "failure",
        code: "insertion_failed",
      })
    })

    it("keeps the previously cached feed on insertion error", async () => {
      const seed = cachedSeed()
      const store = await h.makeUnwritableStore(seed)
      const cached = { kind: "found", feed: seed.feed, timestamp: timestamps.t0() }

      expect(await store.retrieve()).toEqual(cached)
      expect(summarize(await store.insert(uniqueImageFeed(), timestamps.t1()))).toEqual({
        kind: "failure",
        code: "insertion_failed",
      })
      expect(await store.retrieve()).toEqual(cached)
    })

    it("keeps the previously cached feed on an empty-feed insertion error", async () => {
      const seed = cachedSeed()
      const store = await h.makeUnwritableStore(seed)

      await store.insert([], timestamps.t2())

      expect(await store.retrieve()).toEqual({
        kind: "found",
        feed: seed.feed,
        timestamp: timestamps.t0(),
      })
    })
  })
}

export function describeFailableDeleteContract(h: FailableDeleteHarness) {
  describe(`FeedStore failable delete contract: ${h.name}`, () => {
    useHarness(h)

    it("delivers an error on deletion error", async () => {
      const store = await h.makeUndeletableStore(cachedSeed())

      expect(summarize(await store.deleteCachedFeed())).toEqual({
        kind: "failure",
        code: "deletion_failed",
      })
    })

    it("keeps the previously cached feed on deletion error", async () => {
      const seed = cachedSeed()
      const store = await h.makeUndeletableStore(seed)
      const cached = { kind: "found", feed: seed.feed, timestamp: timestamps.t0() }

      expect(await store.retrieve()).toEqual(cached)
      expect(summarize(await store.deleteCachedFeed())).toEqual({
        kind: "failure",
        code: "deletion_failed",
      })
      expect(await store.retrieve()).toEqual(cached)
    })
  })
}

function cachedSeed(): CachedFeed {
  return { feed: uniqueImageFeed(), timestamp: timestamps.t0() }
}
