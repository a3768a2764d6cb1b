export type {
  InventoryCollaborator,
  CatalogCollaborator,
  PriceCollaborator,
  QuotaCollaborator,
  QuotaUsage,
  ListSkusOptions,
  ReportSink,
  ReportFormat,
} from './types.js';
export { mapSkuCapabilities, isRestricted, RawSkuRecordSchema, type RawSkuRecord } from './sku-mapper.js';
export { SnapshotCloud, SnapshotSchema, type Snapshot, type SnapshotInput } from './snapshot.js';
