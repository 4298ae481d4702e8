export type ZipEntry = {
  name: string;
  /** 0 = stored, 8 = deflate. */
  method: number;
  crc32: number;
  /** Local time, two-second resolution. */
  modified: Date;
  compressedSize: number;
  uncompressedSize: number;
  /** Host system that wrote the entry (3 = Unix). */
  hostOs: number;
  /** Unix mode from the external attributes, 0 when the host is not Unix. */
  mode: number;
};

const EOCD_SIGNATURE = 0x06054b50;
const CENTRAL_SIGNATURE = 0x02014b50;
const EOCD_MIN_SIZE = 22;
const UNIX_HOST = 3;

/**
 * Read the central directory of a zip held in memory.
 * Zip64 archives are not supported.
 */
export function readZipEntries(bytes: Uint8Array): ZipEntry[] {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  let eocd = -1;
  for (let i = bytes.byteLength - EOCD_MIN_SIZE; i >= Math.max(0, bytes.byteLength - EOCD_MIN_SIZE - 0xffff); i--) {
    if (view.getUint32(i, true) === EOCD_SIGNATURE) {
      eocd = i;
      break;
    }
  }
  if (eocd === -1) throw new Error("not a zip archive: end of central directory not found");

  const count = view.getUint16(eocd + 10, true);
  let offset = view.getUint32(eocd + 16, true);
  const decoder = new TextDecoder();
  const entries: ZipEntry[] = [];

  for (let n = 0; n < count; n++) {
    if (offset + 46 > bytes.byteLength || view.getUint32(offset, true) !== CENTRAL_SIGNATURE) {
      throw new Error(`corrupt central directory at offset ${offset}`);
    }
    const hostOs = view.getUint8(offset + 5);
    const nameLength = view.getUint16(offset + 28, true);
    const extraLength = view.getUint16(offset + 30, true);
    const commentLength = view.getUint16(offset + 32, true);
    const externalAttrs = view.getUint32(offset + 38, true);
    entries.push({
      name: decoder.decode(bytes.subarray(offset + 46, offset + 46 + nameLength)),
      method: view.getUint16(offset + 10, true),
      crc32: view.getUint32(offset + 16, true),
      modified: dosDateTime(view.getUint16(offset + 14, true), view.getUint16(offset + 12, true)),
      compressedSize: view.getUint32(offset + 20, true),
      uncompressedSize: view.getUint32(offset + 24, true),
      hostOs,
      mode: hostOs === UNIX_HOST ? externalAttrs >>> 16 : 0,
    });
    offset += 46 + nameLength + extraLength + commentLength;
  }

  return entries;
}

function dosDateTime(date: number, time: number): Date {
  return new Date(
    1980 + (date >> 9),
    ((date >> 5) & 0xf) - 1,
    date & 0x1f,
    time >> 11,
    (time >> 5) & 0x3f,
    (time & 0x1f) * 2,
  );
}
