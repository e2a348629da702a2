import type { ModelShape } from './field';

/** `isHomeStudio` → `["is", "home", "studio"]` */
function splitWords(name: string): string[] {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1 $2')
    .split(/[\s_-]+/)
    .filter((word) => word.length > 0)
    .map((word) => word.toLowerCase());
}

function titleCase(words: readonly string[]): string {
  return words.map((word) => word.charAt(0).toUpperCase() + word.slice(1)).join(' ');
}

export function humanize(name: string): string {
  return titleCase(splitWords(name));
}

function startsWithWords(words: readonly string[], prefix: readonly string[]): boolean {
  return prefix.length <= words.length && prefix.every((word, index) => words[index] === word);
}

/**
 * Header for a column path.
 *
 * Lookup order: an override for the full path on the root model, then an
 * override for the last segment on the model that owns it, then title case.
 * For nested paths the parent segment is prepended unless the field name
 * already starts with it, so `studio.name` and `studio.studioName` both read
 * "Studio Name".
 */
export function columnHeader(root: ModelShape, path: string): string {
  const fullOverride = root.headerOverride(path);
  if (fullOverride !== undefined) return fullOverride;

  const segments = path.split('.');
  const last = segments[segments.length - 1] ?? path;

  let owner: ModelShape | undefined = root;
  for (const segment of segments.slice(0, -1)) {
    owner = owner?.child(segment);
  }

  const override = owner?.headerOverride(last);
  if (override !== undefined) return override;

  const parent = segments.length > 1 ? segments[segments.length - 2] : undefined;
  const lastWords = splitWords(last);
  if (parent === undefined) return titleCase(lastWords);

  const parentWords = splitWords(parent);
  return startsWithWords(lastWords, parentWords)
    ? titleCase(lastWords)
    : titleCase([...parentWords, ...lastWords]);
}
