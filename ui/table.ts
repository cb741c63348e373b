import { isElement, listen, querySelectorAll } from "../util/util.ts";

const numeric = (text: string): number | null =>
  text !== "" && !Number.isNaN(Number(text)) ? parseFloat(text) : null;

/** Compare two cell texts, numerically when both parse as numbers */
export const compareCells = (a: string, b: string): number => {
  const x = numeric(a), y = numeric(b);
  if (x !== null && y !== null) return x - y;
  return a < b ? -1 : a > b ? 1 : 0;
};

/**
 * Sort the rows of `header`'s table by its column
 *
 * The first sort is descending, a header already sorted descending sorts
 * ascending.
 *
 * @returns Direction applied
 */
export const sortTable = (
  header: HTMLTableCellElement,
): "asc" | "desc" | undefined => {
  const row = header.parentElement,
    tbody = header.closest("table")?.tBodies[0];
  if (!row || !tbody) return;

  const column = Array.from(row.children).indexOf(header),
    ascending = header.classList.contains("sort-desc"),
    cell = (tr: HTMLTableRowElement) =>
      tr.children[column]?.textContent?.trim() ?? "";

  querySelectorAll("th", row).forEach((th) =>
    th.classList.remove("sort-asc", "sort-desc")
  );
  header.classList.add(ascending ? "sort-asc" : "sort-desc");

  Array.from(tbody.rows)
    .sort((a, b) =>
      ascending
        ? compareCells(cell(a), cell(b))
        : compareCells(cell(b), cell(a))
    )
    .forEach((tr) => tbody.append(tr));
  return ascending ? "asc" : "desc";
};

export const markSortableHeaders = (root: ParentNode): void =>
  querySelectorAll<HTMLTableCellElement>(".table th", root).forEach((th) => {
    if (th.dataset.sortable !== "false") th.style.cursor = "pointer";
  });

/**
 * Sort tables on header clicks, headers with `data-sortable="false"` excepted
 *
 * @returns Function removing the listener
 */
export const initTables = (doc: Document): () => void => {
  markSortableHeaders(doc);
  return listen(doc, "click", (e) => {
    const th = isElement(e.target) &&
      e.target.closest<HTMLTableCellElement>(".table th");
    if (th && th.dataset.sortable !== "false") sortTable(th);
  });
};
