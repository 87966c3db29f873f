export type { VersionStore, ReplaceVersionOptions, VersionSupersession } from './version-store.js'
export { SqliteVersionStore, createSqliteVersionStore } from './version-store-impl.js'
export type { SqliteVersionStoreOptions } from './version-store-impl.js'
