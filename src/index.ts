/**
 * Library entry: the record types, aggregation engine, catalog and text
 * reporters behind the `tally` CLI.
 */

export * from './records/index.js'
export * from './aggregation/index.js'
export * from './reporting/index.js'
export { createCatalog } from './catalog/catalog.js'
export type { Catalog } from './catalog/catalog.js'
export {
  IndexOutOfRangeError,
  RecordTypeError,
  RecordValidationError,
  DuplicateProductError,
  isRecoverableError,
} from './shared/errors.js'
export { formatMoney, formatTable } from './shared/output.js'
