/**
 * Turn a card title into a filename stem.
 *
 * @example
 * slugify("Fix Big Bug")    // "fix-big-bug"
 * slugify("Café & Crème")   // "cafe-and-creme"
 * slugify("!!!")            // "untitled"
 */
export function slugify(title: string): string {
  const slug = title
    .toLowerCase()
    .replace(/&/g, "and")
    .normalize("NFKD")
    .replace(/\p{M}/gu, "")
    .replace(/[^\p{L}\p{N}]/gu, "-")
    .replace(/-+/g, "-")
    .replace(/^-|-$/g, "");
  return slug === "" ? "untitled" : slug;
}
