/**
 * Identifier generation for media occurrence keys.
 */

import { v4 as uuidv4 } from 'uuid';

export type IdFactory = () => string;

export const randomId: IdFactory = () => uuidv4();

/**
 * Deterministic ids ("<prefix>-1", "<prefix>-2", ...)
 */
export function sequentialIds(prefix = 'id'): IdFactory {
  let counter = 0;
  return () => `${prefix}-${++counter}`;
}
