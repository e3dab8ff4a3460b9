import { logInfo } from "./logger.js";
import type { CatalogEntry, CompetitionCatalog, CompetitionSummary } from "./types.js";

type CatalogState =
  | { status: "empty" }
  | { status: "loading"; pending: Promise<CompetitionCatalog> }
  | { status: "ready"; catalog: CompetitionCatalog };

export interface CatalogCache {
  /** Loads the catalog on first use; later calls, and callers racing the first, share that one load. */
  ensureLoaded(): Promise<CompetitionCatalog>;
  status(): CatalogState["status"];
}

export function buildCatalog(competitions: CompetitionSummary[]): CompetitionCatalog {
  const catalog = new Map<string, CatalogEntry>();
  for (const comp of competitions) {
    const existing = catalog.get(comp.name);
    if (existing) {
      // Names are not unique upstream; the later entry wins
      logInfo(`Duplicate competition name "${comp.name}": ${existing.code}#${existing.id} replaced by ${comp.code}#${comp.id}`);
    }
    catalog.set(comp.name, { id: comp.id, code: comp.code });
  }
  return catalog;
}

export function createCatalogCache(listCompetitions: () => Promise<CompetitionSummary[]>): CatalogCache {
  let state: CatalogState = { status: "empty" };

  return {
    ensureLoaded() {
      switch (state.status) {
        case "ready":
          return Promise.resolve(state.catalog);
        case "loading":
          return state.pending;
        case "empty": {
          const pending = listCompetitions().then(
            (competitions) => {
              const catalog = buildCatalog(competitions);
              state = { status: "ready", catalog };
              logInfo(`Loaded ${catalog.size} competitions`);
              return catalog;
            },
            (err: unknown) => {
              state = { status: "empty" };
              throw err;
            },
          );
          state = { status: "loading", pending };
          return pending;
        }
      }
    },

    status() {
      return state.status;
    },
  };
}
