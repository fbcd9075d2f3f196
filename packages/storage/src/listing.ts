import type { ObjectStoreAdapter } from "./adapters/base";
import type { ChildListing, ObjectMeta, StoreCallOptions } from "./types";

export interface ListingOptions extends StoreCallOptions {
  pageSize?: number;
}

/** One level under `prefix`, every page collected. */
export async function listChildren(
  store: ObjectStoreAdapter,
  prefix: string,
  options: ListingOptions = {}
): Promise<ChildListing> {
  const { pageSize, ...callOptions } = options;
  const prefixes: string[] = [];
  const objects: ObjectMeta[] = [];
  let cursor: string | undefined;

  do {
    const page = await store.listChildrenPage({ prefix, cursor, maxKeys: pageSize }, callOptions);
    prefixes.push(...page.prefixes);
    objects.push(...page.objects);
    cursor = page.nextCursor;
  } while (cursor);

  return { prefixes, objects };
}

/** Child prefixes of one level. Object entries are dropped page by page. */
export async function listChildPrefixes(
  store: ObjectStoreAdapter,
  prefix: string,
  options: ListingOptions = {}
): Promise<string[]> {
  const { pageSize, ...callOptions } = options;
  const prefixes: string[] = [];
  let cursor: string | undefined;

  do {
    const page = await store.listChildrenPage({ prefix, cursor, maxKeys: pageSize }, callOptions);
    prefixes.push(...page.prefixes);
    cursor = page.nextCursor;
  } while (cursor);

  return prefixes;
}

/**
 * Every object under `prefix` at any depth. Pages are fetched lazily so only
 * one page is held at a time.
 */
export async function* streamObjects(
  store: ObjectStoreAdapter,
  prefix: string,
  options: ListingOptions = {}
): AsyncGenerator<ObjectMeta, void, undefined> {
  const { pageSize, ...callOptions } = options;
  let cursor: string | undefined;

  do {
    const page = await store.listRecursivePage({ prefix, cursor, maxKeys: pageSize }, callOptions);
    yield* page.objects;
    cursor = page.nextCursor;
  } while (cursor);
}

export async function hasEntriesUnder(
  store: ObjectStoreAdapter,
  prefix: string,
  options: StoreCallOptions = {}
): Promise<boolean> {
  const page = await store.listChildrenPage({ prefix, maxKeys: 1 }, options);
  return page.prefixes.length > 0 || page.objects.length > 0;
}
