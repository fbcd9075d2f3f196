const KB = 1024;
const MB = KB * 1024;
const GB = MB * 1024;

/** Human readable byte count: whole bytes, then KB and MB to one decimal, GB to two. */
export function formatSize(bytes: bigint | number): string {
  const value = Number(bytes);
  if (value < KB) return `${bytes} B`;
  if (value < MB) return `${(value / KB).toFixed(1)} KB`;
  if (value < GB) return `${(value / MB).toFixed(1)} MB`;
  return `${(value / GB).toFixed(2)} GB`;
}
