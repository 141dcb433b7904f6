/**
 * Blanks out x labels so that roughly `maxLabels` remain readable.
 * One label is kept every `max(2, floor(n / maxLabels) * 2)`, counting from
 * the last one so the most recent bucket is always labelled.
 */
export function thinLabels(keys: readonly string[], maxLabels: number): string[] {
  const labels = [...keys];
  if (maxLabels <= 0 || labels.length <= maxLabels) return labels;

  const every = Math.max(2, Math.floor(labels.length / maxLabels) * 2);
  for (let i = labels.length - 1, count = 0; i >= 0; i--, count++) {
    if (count % every !== 0) labels[i] = '';
  }
  return labels;
}
