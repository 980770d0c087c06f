import { NAMING } from '../../constants/index.js';

/**
 * MacZip stores the attributes and resource fork of `dir/name` in an
 * AppleDouble entry named `__MACOSX/dir/._name`. Archive paths always use
 * '/' here.
 */

const ZIP_SEP = '/';
const MAC_ZIP_PREFIX = NAMING.MAC_ZIP_DIR + ZIP_SEP;

/**
 * Derives the header entry name for a ZIP path.
 */
export function generateMacZipName(fullPathName: string): string {
  const slash = fullPathName.lastIndexOf(ZIP_SEP);
  if (slash < 0) {
    return MAC_ZIP_PREFIX + NAMING.ADF_PREFIX + fullPathName;
  }
  const dir = fullPathName.substring(0, slash + 1);
  const leaf = fullPathName.substring(slash + 1);
  return MAC_ZIP_PREFIX + dir + NAMING.ADF_PREFIX + leaf;
}

/**
 * True for `__MACOSX/.../._name` entries.
 */
export function isMacZipHeader(fullPathName: string): boolean {
  if (!fullPathName.startsWith(MAC_ZIP_PREFIX)) {
    return false;
  }
  const leaf = fullPathName.substring(fullPathName.lastIndexOf(ZIP_SEP) + 1);
  return leaf.startsWith(NAMING.ADF_PREFIX) && leaf.length > NAMING.ADF_PREFIX.length;
}

/**
 * Inverse of {@link generateMacZipName}; null when the name is not a header.
 */
export function macZipPrimaryName(headerName: string): string | null {
  if (!isMacZipHeader(headerName)) {
    return null;
  }
  const rest = headerName.substring(MAC_ZIP_PREFIX.length);
  const slash = rest.lastIndexOf(ZIP_SEP);
  const dir = rest.substring(0, slash + 1);
  const leaf = rest.substring(slash + 1 + NAMING.ADF_PREFIX.length);
  return dir + leaf;
}
