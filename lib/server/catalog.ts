import { loadConfig, type AppConfig } from "@/lib/config";
import { createTmdbGateway } from "@/lib/services/tmdb-service";
import { createOmdbGateway } from "@/lib/services/omdb-service";
import { createCatalog, type Catalog } from "@/lib/services/catalog-service";

type Server = { config: AppConfig; catalog: Catalog };

let server: Server | null = null;

function connect(): Server {
  if (server) return server;
  const config = loadConfig();
  const catalog = createCatalog({
    gateway: createTmdbGateway(config.tmdb),
    ratings: createOmdbGateway(config.omdb),
    policy: config.policy,
    watchRegion: config.watchRegion,
    castLimit: config.castLimit,
    similarLimit: config.similarLimit,
  });
  server = { config, catalog };
  return server;
}

export function getCatalog(): Catalog {
  return connect().catalog;
}

export function getConfig(): AppConfig {
  return connect().config;
}

/** Drop the process-wide instance (and its genre memo); the next call rebuilds from env. */
export function resetServer(): void {
  server = null;
}
