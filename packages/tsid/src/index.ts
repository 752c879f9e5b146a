/**
 * @biotap/tsid
 *
 * Time-sorted IDs and prefixed typed IDs.
 *
 * @example
 * ```typescript
 * import { generate, typeOf } from '@biotap/tsid';
 *
 * const id = generate('LINK'); // "lnk_0HZXEQ5Y8JY5Z"
 * typeOf(id); // 'LINK'
 * ```
 */

export { generateRaw, createTsidGenerator, type TsidGenerator, type Clock } from './tsid.js';
export { EntityType, type EntityTypeKey, generate, typeOf } from './typed-id.js';
