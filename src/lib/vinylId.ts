import { createHash } from 'crypto';

function normalizeKeyPart(value: string): string {
  return value.trim().toLowerCase().replace(/\s+/g, '_');
}

export function buildVinylId(name: string, artist: string): string {
  const key = `${normalizeKeyPart(name)}_${normalizeKeyPart(artist)}`;
  return createHash('md5').update(key, 'utf8').digest('hex').slice(0, 8).toUpperCase();
}
