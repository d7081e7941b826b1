// src/lib/bufferUtils.ts
export function toNodeBuffer(buf: unknown): Buffer {
  // if it's already a Node Buffer, return it
  if (Buffer.isBuffer(buf)) return buf;

  // exceljs types its output as ArrayBuffer; other writers hand back views
  if (buf instanceof ArrayBuffer) return Buffer.from(new Uint8Array(buf));
  if (ArrayBuffer.isView(buf)) return Buffer.from(buf.buffer, buf.byteOffset, buf.byteLength);

  throw new TypeError(`Cannot convert ${typeof buf} to a Buffer`);
}
