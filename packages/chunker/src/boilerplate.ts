export interface BoilerplateOptions {
  /** Non-empty lines inspected at the top and at the bottom of each page. */
  edgeLines: number;
  minPages: number;
  ratio: number;
}

/** Case-folded with digits masked, so "Page 3" and "Page 4" share a shape. */
export function lineShape(line: string): string {
  return line.toLowerCase().replace(/\d+/g, "#").replace(/\s+/g, " ").trim();
}

function edgeLineIndices(lines: readonly string[], edgeLines: number): number[] {
  const nonEmpty: number[] = [];
  lines.forEach((line, i) => {
    if (line.length > 0) nonEmpty.push(i);
  });
  const head = nonEmpty.slice(0, edgeLines);
  const tail = nonEmpty.slice(Math.max(edgeLines, nonEmpty.length - edgeLines));
  return [...head, ...tail];
}

/**
 * Find running headers and footers: line shapes that recur at the edges of
 * enough pages. Returns, per page, the indices of lines to drop.
 */
export function findBoilerplate(
  pages: readonly (readonly string[])[],
  options: BoilerplateOptions,
): Set<number>[] {
  const result = pages.map(() => new Set<number>());
  if (pages.length < options.minPages) return result;

  const pagesByShape = new Map<string, Set<number>>();
  const edgesPerPage = pages.map((lines) => edgeLineIndices(lines, options.edgeLines));

  edgesPerPage.forEach((indices, pageNo) => {
    for (const i of indices) {
      const shape = lineShape(pages[pageNo]?.[i] ?? "");
      if (shape.length === 0) continue;
      const seen = pagesByShape.get(shape) ?? new Set<number>();
      seen.add(pageNo);
      pagesByShape.set(shape, seen);
    }
  });

  const threshold = Math.max(2, Math.ceil(options.ratio * pages.length));

  edgesPerPage.forEach((indices, pageNo) => {
    for (const i of indices) {
      const shape = lineShape(pages[pageNo]?.[i] ?? "");
      const seen = pagesByShape.get(shape);
      if (seen && seen.size >= threshold) {
        result[pageNo]?.add(i);
      }
    }
  });

  return result;
}
