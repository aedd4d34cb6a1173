import { ASSETS, PACKAGE_OUTPUT } from '../config/constants';

const WRAPPED = new RegExp(
  `^\\s*<div\\b[^>]*\\bclass\\s*=\\s*(['"])[^'"]*\\b${PACKAGE_OUTPUT.UNIT_ROOT_CLASS}\\b[^'"]*\\1[^>]*>`,
  'i',
);

/**
 * Wrap unit content in a single scoped root element. Content that already
 * starts with the root element is returned unchanged.
 */
export function wrapUnitHtml(content: string): string {
  if (WRAPPED.test(content)) {
    return content;
  }
  return `<div class="${PACKAGE_OUTPUT.UNIT_ROOT_CLASS}">${content}</div>`;
}

/**
 * Module-relative path of a package asset: `assets/x.png` becomes
 * `modules/<packageId>/assets/x.png`. Other paths (data and http URLs,
 * already-prefixed paths) are kept.
 */
export function moduleAssetPath(path: string, packageId: string): string {
  if (!path.startsWith(`${ASSETS.DIRECTORY}/`)) {
    return path;
  }
  return `${PACKAGE_OUTPUT.MODULE_ROOT}/${packageId}/${path}`;
}
