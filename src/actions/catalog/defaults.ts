export interface CatalogDefaults {
  readonly memory_mb: number;
  readonly cpu_count: number;
  readonly generation: number;
  readonly switch_name: string;
  readonly controller_type: string;
}

export const CATALOG_DEFAULTS: CatalogDefaults = {
  memory_mb: 2048,
  cpu_count: 2,
  generation: 2,
  switch_name: "Default Switch",
  controller_type: "SCSI",
};
