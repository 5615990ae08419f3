// Size measurement

import { BYTES_PER_KB } from '../../constants'

/** Size of the UTF-8 encoding in KiB */
export function measureSizeKb(document: string): number {
  return Buffer.byteLength(document, 'utf8') / BYTES_PER_KB
}
