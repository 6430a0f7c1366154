/**
 * Watch-root layouts
 *
 * flat:  <root>/<source path>
 * dated: <root>/<YYYYMMDD|DDMMYYYY>/to/<source path>
 */

import type { Layout } from "./types.js";

export type LayoutMatch = {
  /** Path handed to the mapper */
  mappablePath: string;
  /** Date folder, dated layout only */
  batch?: string;
};

const BATCH_MARKER = "to";

function isValidDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

/**
 * Eight digits forming a real calendar date, read as YYYYMMDD first and
 * DDMMYYYY second
 */
export function isDateFolder(name: string): boolean {
  if (!/^\d{8}$/.test(name)) return false;

  const asYmd = isValidDate(
    Number(name.slice(0, 4)),
    Number(name.slice(4, 6)),
    Number(name.slice(6, 8))
  );
  if (asYmd) return true;

  return isValidDate(
    Number(name.slice(4, 8)),
    Number(name.slice(2, 4)),
    Number(name.slice(0, 2))
  );
}

/**
 * Apply the layout to a normalized watch-relative path. Returns
 * undefined when the path does not follow the layout.
 */
export function applyLayout(layout: Layout, relativePath: string): LayoutMatch | undefined {
  if (layout === "flat") {
    return { mappablePath: relativePath };
  }

  const segments = relativePath.split("/");
  // date folder, marker, at least a file name
  if (segments.length < 3) return undefined;

  const [batch, marker, ...rest] = segments;
  if (!isDateFolder(batch) || marker !== BATCH_MARKER) {
    return undefined;
  }

  return { mappablePath: rest.join("/"), batch };
}
