import { createLogger } from "../../services/logService";
import { ConfigurationError, errorMessage } from "../errors";
import { sourceOf } from "./projectRef";
import { createCurseforgeProvider } from "./providers/curseforgeProvider";
import { modrinthProvider } from "./providers/modrinthProvider";
import type {
  ContentProject,
  ContentSearchFilters,
  ContentSourceProvider,
  ModSource,
} from "./types";

const logger = createLogger("registry");

export interface ContentRegistryOptions {
  curseforgeApiKey?: string;
  /** Replaces the built-in provider of the same source. */
  providers?: ContentSourceProvider[];
}

export class ContentProviderRegistry {
  private readonly providers: Map<ModSource, ContentSourceProvider>;

  constructor(options: ContentRegistryOptions = {}) {
    this.providers = new Map<ModSource, ContentSourceProvider>([
      ["curseforge", createCurseforgeProvider(options.curseforgeApiKey)],
      ["modrinth", modrinthProvider],
    ]);
    for (const provider of options.providers ?? []) {
      this.providers.set(provider.source, provider);
    }
  }

  getProvider(source: ModSource) {
    const provider = this.providers.get(source);
    if (!provider) {
      throw new ConfigurationError(`Proveedor no soportado: ${source}`);
    }
    return provider;
  }

  /** Provider owning a project or version id, chosen by its prefix. */
  providerFor(id: string) {
    return this.getProvider(sourceOf(id.trim()));
  }

  async searchAll(filters: ContentSearchFilters): Promise<ContentProject[]> {
    const providers = Array.from(this.providers.values());
    const results = await Promise.allSettled(providers.map((provider) => provider.search(filters)));
    return results.flatMap((result, index) => {
      if (result.status === "fulfilled") {
        return result.value.hits;
      }
      logger.warn(
        `Búsqueda fallida en ${providers[index].source}: ${errorMessage(result.reason)}`,
      );
      return [];
    });
  }
}
