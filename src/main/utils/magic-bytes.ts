import fs from 'fs-extra';

export type MagicType = 'id3' | 'jpg' | 'png' | 'unknown';

const MAGIC_MAP: Array<{ type: MagicType; bytes: number[] }> = [
  { type: 'id3', bytes: [0x49, 0x44, 0x33] },
  { type: 'jpg', bytes: [0xff, 0xd8, 0xff] },
  { type: 'png', bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] }
];

export const detectMagicBuffer = (buffer: Buffer): MagicType => {
  for (const sig of MAGIC_MAP) {
    const sample = buffer.subarray(0, sig.bytes.length);
    if (sample.length < sig.bytes.length) continue;
    if (sig.bytes.every((value, idx) => sample[idx] === value)) {
      return sig.type;
    }
  }
  return 'unknown';
};

export const detectMagicType = async (filePath: string): Promise<MagicType> => {
  const fd = await fs.promises.open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(16);
    const { bytesRead } = await fd.read(buffer, 0, 16, 0);
    return detectMagicBuffer(buffer.subarray(0, bytesRead));
  } finally {
    await fd.close();
  }
};
