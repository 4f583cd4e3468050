// src/utils/compression.ts
import zlib from 'node:zlib';
import * as snappy from 'snappy';

export type CompressionCodec = 'snappy' | 'gzip';
export type CompressionSetting = boolean | { codec: CompressionCodec };

export function isCompressionEnabled(
  v: CompressionSetting | undefined
): v is true | { codec: CompressionCodec } {
  return !!v;
}

function resolveCodec(setting: true | { codec: CompressionCodec }): CompressionCodec {
  return setting === true ? 'snappy' : setting.codec;
}

function toUint8(buf: Buffer): Uint8Array {
  return new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength);
}

function ensureBuffer(x: Buffer | string): Buffer {
  return Buffer.isBuffer(x) ? x : Buffer.from(x);
}

/**
 * Compresses a message payload before it is handed to the transport.
 *
 * Synchronous: `publish()` reports admission before it returns.
 */
export function compress(
  buf: Uint8Array,
  setting?: CompressionSetting
): Uint8Array {
  if (!isCompressionEnabled(setting)) return buf;

  if (resolveCodec(setting) === 'gzip') {
    return toUint8(zlib.gzipSync(buf));
  }

  return toUint8(ensureBuffer(snappy.compressSync(Buffer.from(buf))));
}

/**
 * Reverses {@link compress}. Throws when the bytes are not valid for the
 * configured codec; callers on the receive path catch and log.
 */
export function decompress(
  buf: Uint8Array,
  setting?: CompressionSetting
): Uint8Array {
  if (!isCompressionEnabled(setting)) return buf;

  if (resolveCodec(setting) === 'gzip') {
    return toUint8(zlib.gunzipSync(buf));
  }

  const out = snappy.uncompressSync(Buffer.from(buf), { asBuffer: true });
  return toUint8(ensureBuffer(out));
}
