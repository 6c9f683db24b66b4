import { v4 as uuidv4 } from 'uuid';
import { IndexEpoch } from '../../../shared/domain/models/SearchRecord.js';

/**
 * Mint the epoch of a new crawl run. Records saved by the run carry it, so
 * that records of earlier runs can be told apart and expired.
 */
export function newEpoch(): IndexEpoch {
  return uuidv4();
}
