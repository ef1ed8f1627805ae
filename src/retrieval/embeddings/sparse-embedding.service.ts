/**
 * Sparse Embedding Service
 * Log-scaled term frequencies over hashed term ids.
 * Term ids come from a hash of the term so indexing and query time agree
 * without sharing a vocabulary.
 */

import { Injectable } from '@nestjs/common';
import * as crypto from 'crypto';
import type { SparseVector } from '../store/types';

/** Term ids live in [0, 2^31) */
const TERM_ID_HEX_DIGITS = 8;
const TERM_ID_MASK = 0x7fffffff;

@Injectable()
export class SparseEmbeddingService {
  generateSparseEmbedding(text: string): SparseVector {
    const termFrequency = this.calculateTermFrequency(this.tokenize(text));

    const weights = new Map<number, number>();
    for (const [term, tf] of termFrequency.entries()) {
      const termId = this.termId(term);
      // Log-scaled TF to avoid overweighting repeated terms
      weights.set(termId, (weights.get(termId) ?? 0) + Math.log(1 + tf));
    }

    // Sorted by index, as Qdrant expects
    const sorted = Array.from(weights.entries()).sort((a, b) => a[0] - b[0]);

    return {
      indices: sorted.map(([index]) => index),
      values: sorted.map(([, value]) => value),
    };
  }

  /**
   * Lowercased word terms longer than two characters
   */
  tokenize(text: string): string[] {
    return text
      .toLowerCase()
      .replace(/[^\w\s]/g, ' ')
      .split(/\s+/)
      .filter((term) => term.length > 2);
  }

  termId(term: string): number {
    const hash = crypto.createHash('md5').update(term).digest('hex');
    return parseInt(hash.slice(0, TERM_ID_HEX_DIGITS), 16) & TERM_ID_MASK;
  }

  private calculateTermFrequency(terms: string[]): Map<string, number> {
    const tf = new Map<string, number>();
    for (const term of terms) {
      tf.set(term, (tf.get(term) ?? 0) + 1);
    }
    return tf;
  }
}
