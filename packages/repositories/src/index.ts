// @roomsense/repositories
// Repository interfaces and implementations for storage-independent data access.
//
// This package defines the "contract" for data operations. The actual implementations
// (Postgres, in-memory) fulfill these contracts, allowing the runtime
// to work with any storage backend.
//
// Key concepts:
// - Interfaces define WHAT operations are available, not HOW they're implemented
// - RepositoryContext bundles all repositories for dependency injection
// - Code against interfaces so the engine never depends on a storage backend

export * from './interfaces/index.js';
export {
  createInMemoryRepositoryContext,
  type InMemoryRepositoryContext,
  type InMemoryDataStore,
} from './in-memory/index.js';
export * as postgres from './postgres/index.js';
