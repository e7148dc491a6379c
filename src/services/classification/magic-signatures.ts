// Leading-byte signatures of common binary formats

export interface MagicSignature {
  name: string;
  bytes: readonly number[];
  category: string;
}

export const MAGIC_SIGNATURES: readonly MagicSignature[] = [
  { name: 'PNG', bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a], category: 'Images' },
  { name: 'JPEG', bytes: [0xff, 0xd8, 0xff], category: 'Images' },
  { name: 'GIF87a', bytes: [0x47, 0x49, 0x46, 0x38, 0x37, 0x61], category: 'Images' },
  { name: 'GIF89a', bytes: [0x47, 0x49, 0x46, 0x38, 0x39, 0x61], category: 'Images' },
  { name: 'PDF', bytes: [0x25, 0x50, 0x44, 0x46], category: 'Documents' },
  { name: 'ZIP', bytes: [0x50, 0x4b, 0x03, 0x04], category: 'Archives' },
  { name: 'RAR', bytes: [0x52, 0x61, 0x72, 0x21, 0x1a, 0x07, 0x00], category: 'Archives' },
  { name: '7-Zip', bytes: [0x37, 0x7a, 0xbc, 0xaf, 0x27, 0x1c], category: 'Archives' },
  { name: 'ICO', bytes: [0x00, 0x00, 0x01, 0x00], category: 'Images' },
];

// ISO base media files (mp4, mov, 3gp, heic...) carry "ftyp" at offset 4
const FTYP = [0x66, 0x74, 0x79, 0x70];
const FTYP_OFFSET = 4;
export const ISO_MEDIA_CATEGORY = 'Videos';

function matchesAt(header: Uint8Array, bytes: readonly number[], offset: number): boolean {
  if (header.length < offset + bytes.length) {
    return false;
  }
  return bytes.every((byte, index) => header[offset + index] === byte);
}

export function detectMagicCategory(header: Uint8Array): string | undefined {
  const signature = MAGIC_SIGNATURES.find((candidate) => matchesAt(header, candidate.bytes, 0));
  if (signature) {
    return signature.category;
  }
  return matchesAt(header, FTYP, FTYP_OFFSET) ? ISO_MEDIA_CATEGORY : undefined;
}
