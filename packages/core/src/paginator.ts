import type { Page, ResourceKind } from '@tasksync/protocol';
import { TaskSyncError, cancelledError } from './errors.js';
import { SyncBus } from './events.js';
import { unwrap, type Retrier } from './retrier.js';

export type FetchPage<T> = (cursor: string | undefined, signal?: AbortSignal) => Promise<Page<T>>;

export interface PaginateOptions {
  retrier: Retrier;
  signal?: AbortSignal;
  bus?: SyncBus;
  /** Name used in page events and log lines */
  label?: string;
  resource?: ResourceKind;
}

/** Items gathered by a traversal, with the error that ended it early, if any */
export interface Traversal<T> {
  items: T[];
  pages: number;
  error?: TaskSyncError;
}

export interface CountTraversal {
  count: number;
  pages: number;
  error?: TaskSyncError;
}

/**
 * Lazy, restartable sequence over a cursor-paginated listing.
 *
 * Every `for await` (and every collect()/count() call) starts a fresh
 * traversal from the first page; nothing is resumed from an earlier
 * consumer. Each page fetch runs through the Retrier.
 *
 * Consistency: read-committed, not snapshot-isolated. Items are yielded
 * in service order and once per item per traversal, but an item created
 * or deleted while the traversal runs may or may not appear, and an item
 * that moves between pages during the traversal can be seen twice or
 * not at all. No deduplication is attempted.
 *
 * A page that fails after retries ends the iteration by throwing the
 * classified error; items already yielded stay valid.
 */
export class PageStream<T> implements AsyncIterable<T> {
  private fetchPage: FetchPage<T>;
  private options: PaginateOptions;
  private bus: SyncBus;
  private label: string;

  constructor(fetchPage: FetchPage<T>, options: PaginateOptions) {
    this.fetchPage = fetchPage;
    this.options = options;
    this.bus = options.bus ?? new SyncBus();
    this.label = options.label ?? 'list';
  }

  /** Iterate whole pages */
  async *pages(): AsyncGenerator<Page<T>, void, undefined> {
    const { retrier, signal, resource } = this.options;
    const seenCursors = new Set<string>();
    let cursor: string | undefined;
    let pageNumber = 0;

    while (true) {
      const current = cursor;
      const result = await retrier.execute((_attempt, attemptSignal) => this.fetchPage(current, attemptSignal), {
        signal,
        resource,
        label: `${this.label} page ${pageNumber + 1}`,
      });
      const page = unwrap(result);
      pageNumber++;
      this.bus.emitPage(this.label, pageNumber, page.items.length, page.hasMore);

      yield page;

      const next = page.pageToken;
      if (!page.hasMore || !next) return;
      if (seenCursors.has(next)) {
        throw new TaskSyncError('Unknown', `${this.label}: cursor did not advance after page ${pageNumber}`);
      }
      seenCursors.add(next);
      cursor = next;
    }
  }

  [Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    return this.trackPages(() => undefined);
  }

  /** Drain the sequence, keeping partial items when it ends early */
  async collect(): Promise<Traversal<T>> {
    const items: T[] = [];
    let pages = 0;
    try {
      for await (const item of this.trackPages(() => pages++)) {
        items.push(item);
      }
      return { items, pages };
    } catch (err) {
      return { items, pages, error: this.options.retrier.classifier.classifyThrown(err) };
    }
  }

  /** Drain the sequence counting items without keeping them */
  async count(): Promise<CountTraversal> {
    let count = 0;
    let pages = 0;
    try {
      for await (const _item of this.trackPages(() => pages++)) {
        count++;
      }
      return { count, pages };
    } catch (err) {
      return { count, pages, error: this.options.retrier.classifier.classifyThrown(err) };
    }
  }

  private async *trackPages(onPage: () => void): AsyncGenerator<T, void, undefined> {
    const { signal } = this.options;
    for await (const page of this.pages()) {
      onPage();
      for (const item of page.items) {
        if (signal?.aborted) throw cancelledError(signal.reason);
        yield item;
      }
    }
  }
}

/** Wrap a page-fetching function into a lazy item sequence */
export function paginate<T>(fetchPage: FetchPage<T>, options: PaginateOptions): PageStream<T> {
  return new PageStream(fetchPage, options);
}
