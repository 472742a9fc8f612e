import { StorageLayout } from "../core/paths";
import { SqliteStore } from "./sqliteStore";
import { CatalogStore } from "./types";

export function createStore(layout: StorageLayout): CatalogStore {
  return new SqliteStore(layout.catalogPath);
}

export { SqliteStore } from "./sqliteStore";
export * from "./types";
