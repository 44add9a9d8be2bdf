/** ISO 9797-1 method 2: 0x80, then zeros up to the next multiple of `blockSize`. */
export function padIso9797M2(data: Uint8Array, blockSize: number): Buffer {
  if (!Number.isInteger(blockSize) || blockSize <= 0) {
    throw new RangeError(`Invalid block size: ${blockSize}`);
  }
  const total = Math.ceil((data.length + 1) / blockSize) * blockSize;
  const out = Buffer.alloc(total);
  out.set(data, 0);
  out[data.length] = 0x80;
  return out;
}

/** Strips trailing zeros and a single 0x80; returns the input unchanged when no marker is found. */
export function unpadIso9797M2(data: Uint8Array): Buffer {
  let i = data.length - 1;
  while (i >= 0 && data[i] === 0x00) i--;
  if (i >= 0 && data[i] === 0x80) return Buffer.from(data.subarray(0, i));
  return Buffer.from(data);
}
