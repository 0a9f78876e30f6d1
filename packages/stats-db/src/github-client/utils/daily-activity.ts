import type { CommitEntry, DailyActivity, SequenceItem } from "../types";

export const MAX_AUTHOR_NAME_LENGTH = 100;

export const EPOCH_DATE = "1970-01-01";

export class ActivityOrderError extends Error {
  constructor(
    readonly previousDate: string,
    readonly date: string
  ) {
    super(
      `Commits must arrive newest first with each date contiguous, got ${date} after ${previousDate}`
    );
    this.name = "ActivityOrderError";
  }
}

/**
 * Commits ordered by date, newest first, with all commits of one date next
 * to each other. This is the order GitHub's commit listing returns.
 */
export type DateDescendingCommits =
  | Iterable<SequenceItem<CommitEntry> | CommitEntry>
  | AsyncIterable<SequenceItem<CommitEntry> | CommitEntry>;

export interface AggregateOptions {
  /**
   * Throw ActivityOrderError when a date is newer than the run before it.
   * Defaults to on outside production.
   */
  checkOrder?: boolean;
}

export function isAcceptedAuthor(author: string | null): author is string {
  return (
    author !== null &&
    author.length > 0 &&
    author.length <= MAX_AUTHOR_NAME_LENGTH
  );
}

/**
 * Folds each run of same-date commits into one DailyActivity.
 *
 * A `failed` item from the source is passed on and ends the output; the day
 * in progress at that point is incomplete and is not emitted.
 */
export async function* aggregateDailyActivity(
  commits: DateDescendingCommits,
  options: AggregateOptions = {}
): AsyncGenerator<SequenceItem<DailyActivity>> {
  const checkOrder =
    options.checkOrder ?? process.env.NODE_ENV !== "production";

  let currentDate: string | null = null;
  let count = 0;
  let authors = new Set<string>();

  for await (const entry of commits) {
    const item: SequenceItem<CommitEntry> =
      "type" in entry ? entry : { type: "item", value: entry };

    if (item.type === "failed") {
      yield item;
      return;
    }
    if (item.type === "skipped") {
      yield item;
      continue;
    }

    const { date, author } = item.value;
    if (currentDate === null) {
      currentDate = date;
    } else if (date !== currentDate) {
      if (checkOrder && date > currentDate) {
        throw new ActivityOrderError(currentDate, date);
      }

      yield {
        type: "item",
        value: { date: currentDate, commits: count, authors },
      };
      count = 0;
      authors = new Set<string>();
      currentDate = date;
    }

    count += 1;
    if (isAcceptedAuthor(author)) {
      authors.add(author);
    }
  }

  if (currentDate !== null && count > 0) {
    yield {
      type: "item",
      value: { date: currentDate, commits: count, authors },
    };
  }
}
