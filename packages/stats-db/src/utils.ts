/**
 * The `owner/name` form GitHub uses for a repository's full name.
 */
export function repositoryKey(owner: string, name: string): string {
  return `${owner}/${name}`;
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Chunk size must be a positive integer, got ${size}`);
  }

  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export function formatDuration(startedAt: number): string {
  return `${((Date.now() - startedAt) / 1000).toFixed(2)}s`;
}
