import { ASSETS } from '../config/constants';

const EXTENSIONS: Record<string, string> = {
  'image/png': 'png',
  'image/jpeg': 'jpg',
  'image/gif': 'gif',
  'image/webp': 'webp',
  'image/svg+xml': 'svg',
  'image/tiff': 'tiff',
  'image/bmp': 'bmp',
};

export function extensionFor(mimeType: string): string {
  return EXTENSIONS[mimeType.toLowerCase()] ?? 'bin';
}

/**
 * Package-relative asset path derived from the owning section's path key and
 * its per-section sequence number, e.g.
 * `assets/ch-01-intro_sec-02-setup_img-0003.png`
 */
export function assetPath(
  sectionPathKey: readonly string[],
  kind: 'img' | 'table',
  sequence: number,
  mimeType: string,
): string {
  const stem = sectionPathKey
    .slice(1)
    .map((segment) => segment.replace(/\//g, '-'))
    .join('_');
  const number = String(sequence).padStart(ASSETS.SEQUENCE_DIGITS, '0');
  return `${ASSETS.DIRECTORY}/${stem}_${kind}-${number}.${extensionFor(mimeType)}`;
}
