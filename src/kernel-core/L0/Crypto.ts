// src/kernel-core/L0/Crypto.ts
import { createHash } from 'crypto';

// 1.1 Hash Function (SHA-256)
export function hash(data: string): string {
    return createHash('sha256').update(data).digest('hex');
}

// 1.2 Canonical text form: upper-cased tokens joined by single spaces
export function canonicalize(text: string): string {
    return tokenize(text).join(' ');
}

export function tokenize(text: string): string[] {
    return text.toUpperCase().split(/\s+/).filter(token => token.length > 0);
}

// 1.3 Message identity: capture spacing and line breaks never change it
export function fingerprint(text: string): string {
    return hash(canonicalize(text));
}
