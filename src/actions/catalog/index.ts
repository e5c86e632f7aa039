import { ActionRegistry, type ActionEntry } from "../registry.js";
import { CATALOG_DEFAULTS, type CatalogDefaults } from "./defaults.js";
import { createSnapshot, deleteSnapshot, hasSnapshot } from "./snapshots.js";
import { testInstall } from "./system.js";
import {
  attachVolume,
  createVolume,
  deleteVolume,
  detachVolume,
  getVolumes,
  hasVolume,
  snapshotVolume,
} from "./volumes.js";
import {
  configureNetworks,
  createWorker,
  deleteWorker,
  getWorker,
  hasWorker,
  listWorkers,
  rebootWorker,
  setWorkerMetadata,
  startWorker,
} from "./workers.js";

export { CATALOG_DEFAULTS, type CatalogDefaults } from "./defaults.js";

export const PROVIDER_NAME = "hyperv";
export const PROVIDER_TYPE = "command";

/** Every action in its published order. */
export function createCatalog(overrides: Partial<CatalogDefaults> = {}): ActionEntry[] {
  const defaults: CatalogDefaults = { ...CATALOG_DEFAULTS, ...overrides };
  return [
    testInstall,
    listWorkers,
    createWorker(defaults),
    deleteWorker,
    getWorker,
    hasWorker,
    startWorker,
    getVolumes,
    hasVolume,
    createVolume,
    deleteVolume,
    attachVolume(defaults),
    detachVolume(defaults),
    createSnapshot,
    deleteSnapshot,
    hasSnapshot,
    rebootWorker,
    configureNetworks,
    setWorkerMetadata,
    snapshotVolume,
  ];
}

export function createRegistry(overrides?: Partial<CatalogDefaults>): ActionRegistry {
  return new ActionRegistry(createCatalog(overrides));
}
