const BYTES_PER_SAMPLE = 2;

export function encodeWav(pcm16: Buffer, sampleRateHz: number, channels: number): Buffer {
  const header = Buffer.alloc(44);
  const byteRate = sampleRateHz * channels * BYTES_PER_SAMPLE;

  header.write("RIFF", 0, "ascii");
  header.writeUInt32LE(36 + pcm16.length, 4);
  header.write("WAVE", 8, "ascii");
  header.write("fmt ", 12, "ascii");
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRateHz, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(channels * BYTES_PER_SAMPLE, 32);
  header.writeUInt16LE(BYTES_PER_SAMPLE * 8, 34);
  header.write("data", 36, "ascii");
  header.writeUInt32LE(pcm16.length, 40);

  return Buffer.concat([header, pcm16]);
}

export function extractPcm16FromWav(wavData: Buffer): Buffer {
  if (wavData.length < 44) {
    return Buffer.alloc(0);
  }
  const riff = wavData.toString("ascii", 0, 4);
  if (riff !== "RIFF") {
    return Buffer.alloc(0);
  }
  let offset = 12;
  while (offset + 8 <= wavData.length) {
    const chunkId = wavData.toString("ascii", offset, offset + 4);
    const chunkSize = wavData.readUInt32LE(offset + 4);
    if (chunkId === "data") {
      return wavData.subarray(offset + 8, offset + 8 + chunkSize);
    }
    offset += 8 + chunkSize;
    if (chunkSize % 2 !== 0) {
      offset++;
    }
  }
  return Buffer.alloc(0);
}

export function sampleCount(pcm16: Buffer): number {
  return Math.floor(pcm16.length / BYTES_PER_SAMPLE);
}

export function rmsAmplitude(pcm16: Buffer): number {
  const count = sampleCount(pcm16);
  if (count === 0) {
    return 0;
  }
  let sumSquares = 0;
  for (let i = 0; i < count; i++) {
    const sample = pcm16.readInt16LE(i * BYTES_PER_SAMPLE);
    sumSquares += sample * sample;
  }
  return Math.sqrt(sumSquares / count);
}

/**
 * Re-chunks a raw PCM16 byte stream on sample boundaries. An odd trailing byte
 * is held back and prepended to the next chunk; a chunk that yields no whole
 * sample returns undefined.
 */
export function createSampleAligner(): (chunk: Buffer) => Buffer | undefined {
  let carry: Buffer | undefined;
  return (chunk) => {
    const bytes = carry ? Buffer.concat([carry, chunk]) : chunk;
    const usable = bytes.length - (bytes.length % BYTES_PER_SAMPLE);
    carry = usable < bytes.length ? Buffer.from(bytes.subarray(usable)) : undefined;
    return usable > 0 ? bytes.subarray(0, usable) : undefined;
  };
}
