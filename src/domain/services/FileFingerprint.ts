import crypto from 'node:crypto';

export type Fingerprint = string;

export const fingerprint = (content: Uint8Array): Fingerprint =>
  crypto.createHash('sha256').update(content).digest('hex');

// Multi-file statements persist their fingerprints as one comma-joined column.
export const joinFingerprints = (fingerprints: Fingerprint[]): string | null =>
  fingerprints.length > 0 ? fingerprints.join(',') : null;

export const splitFingerprints = (stored: string | null | undefined): Fingerprint[] =>
  (stored ?? '')
    .split(',')
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
