/**
 * Lowercase ASCII slug: accents are folded, every other run of
 * non-alphanumerics becomes a single dash. Empty results become `untitled`.
 */
export function slugify(text: string): string {
  const slug = text
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug || 'untitled';
}

/**
 * Hands out slugs that are unique among siblings; repeats get `-2`, `-3`...
 */
export class SlugRegistry {
  private readonly seen = new Map<string, number>();

  claim(title: string): string {
    const base = slugify(title);
    const count = this.seen.get(base) ?? 0;
    this.seen.set(base, count + 1);
    return count === 0 ? base : `${base}-${count + 1}`;
  }
}
