/**
 * Classifier module barrel export.
 *
 * classify() decides the category of a single line; bucket() runs it over
 * the whole input.
 */

export { classify, matchesRule } from './classify.js';
export { bucket, bucketCounts } from './bucket.js';
