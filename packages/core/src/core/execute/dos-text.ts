import { FILE_TYPES } from '../../constants/index.js';
import type { AttributeSnapshot } from '../attributes/file-attribs.js';
import type { DOSConvMode } from '../callbacks/callback-facts.js';

/**
 * DOS 3.x stores text with the high bit set. Picks the conversion for a data
 * fork moving between a DOS-flavored volume and anything else.
 */
export function selectDOSConv(
  attrs: AttributeSnapshot,
  enabled: boolean,
  srcIsDOS: boolean,
  dstIsDOS: boolean
): DOSConvMode {
  if (!enabled || attrs.fileType !== FILE_TYPES.TXT || srcIsDOS === dstIsDOS) {
    return 'none';
  }
  return srcIsDOS ? 'from-dos' : 'to-dos';
}

/** Converts `count` bytes of `buf` in place. */
export function applyDOSConv(buf: Uint8Array, count: number, mode: DOSConvMode): void {
  switch (mode) {
    case 'from-dos':
      for (let i = 0; i < count; i++) {
        buf[i] &= 0x7f;
      }
      break;
    case 'to-dos':
      for (let i = 0; i < count; i++) {
        if (buf[i] !== 0) {
          buf[i] |= 0x80;
        }
      }
      break;
    case 'none':
      break;
  }
}
