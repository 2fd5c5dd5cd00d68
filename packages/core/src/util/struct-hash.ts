import { createHash } from 'node:crypto';
import type { AbiIr } from '../codec/ir.js';
import { canonicalizeForHash } from './canonical-json.js';

export interface StructuralHashResult {
  digest: string;
  canonical: string;
}

export function structuralHash(value: AbiIr): StructuralHashResult {
  const canonical = canonicalizeForHash(value);
  const digest = createHash('sha256').update(canonical.buffer).digest('hex');
  return { digest, canonical: canonical.text };
}
