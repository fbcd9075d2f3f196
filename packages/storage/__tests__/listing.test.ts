import { describe, expect, it, vi } from "vitest";
import { InMemoryObjectStoreAdapter } from "../src/adapters/memory";
import { hasEntriesUnder, listChildPrefixes, listChildren, streamObjects } from "../src/listing";

function store() {
  const adapter = new InMemoryObjectStoreAdapter({ pageSize: 2 });
  for (const key of ["logs/2024/01.txt", "logs/2024/02.txt", "logs/a.txt", "logs/b.txt", "logs/c.txt", "readme.md"]) {
    adapter.put(key, { size: 5 });
  }
  return adapter;
}

describe("listing helpers", () => {
  it("collects every page of a single level", async () => {
    const adapter = store();
    const spy = vi.spyOn(adapter, "listChildrenPage");

    const listing = await listChildren(adapter, "logs/");

    expect(listing.prefixes).toEqual(["logs/2024/"]);
    expect(listing.objects.map((object) => object.key)).toEqual(["logs/a.txt", "logs/b.txt", "logs/c.txt"]);
    expect(spy).toHaveBeenCalledTimes(2);
  });

  it("keeps only child prefixes across pages", async () => {
    const adapter = store();
    const spy = vi.spyOn(adapter, "listChildrenPage");

    await expect(listChildPrefixes(adapter, "logs/")).resolves.toEqual(["logs/2024/"]);
    expect(spy.mock.calls.map(([query]) => query.cursor === undefined)).toEqual([true, false]);
  });

  it("streams all objects under a prefix lazily", async () => {
    const adapter = store();
    const spy = vi.spyOn(adapter, "listRecursivePage");
    const iterator = streamObjects(adapter, "logs/");

    const first = await iterator.next();
    expect(first.value).toMatchObject({ key: "logs/2024/01.txt" });
    expect(spy).toHaveBeenCalledTimes(1);

    const rest: string[] = [];
    for await (const object of iterator) {
      rest.push(object.key);
    }
    expect(rest).toEqual(["logs/2024/02.txt", "logs/a.txt", "logs/b.txt", "logs/c.txt"]);
    expect(spy).toHaveBeenCalledTimes(3);
  });

  it("never issues a recursive listing when browsing", async () => {
    const adapter = store();
    const recursive = vi.spyOn(adapter, "listRecursivePage");

    await listChildren(adapter, "");

    expect(recursive).not.toHaveBeenCalled();
  });

  it("detects whether anything lives under a prefix", async () => {
    const adapter = store();

    await expect(hasEntriesUnder(adapter, "logs/")).resolves.toBe(true);
    await expect(hasEntriesUnder(adapter, "logs/2024/")).resolves.toBe(true);
    await expect(hasEntriesUnder(adapter, "log/")).resolves.toBe(false);
  });
});
