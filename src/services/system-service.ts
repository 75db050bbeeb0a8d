import type { Config } from "../config";
import type { QueryExecutor } from "../database/client";
import type { JobStatusStore } from "../jobs/status-store";
import type { IdResolver } from "./resolution/id-resolver";
import type { DefaultSearchService } from "./search-service";
import {
  type OntologyService,
  type ReportingProvider,
  type SystemService,
  type SystemServiceStatus,
  reportProvider,
} from "./types";

export interface SystemServiceDependencies {
  config: Config;
  client: QueryExecutor;
  resolver: IdResolver;
  search: DefaultSearchService;
  ontology: OntologyService;
  embeddingProvider: ReportingProvider;
  llm?: ReportingProvider;
  jobs?: JobStatusStore;
}

export class DefaultSystemService implements SystemService {
  #deps: SystemServiceDependencies;

  constructor(deps: SystemServiceDependencies) {
    this.#deps = deps;
  }

  async status(): Promise<SystemServiceStatus> {
    const { config, llm } = this.#deps;
    const ok = await this.#deps.client.healthCheck();

    return {
      env: config.env,
      logLevel: config.logLevel,
      store: {
        ok,
        baseUrl: `http://${config.store.host}:${config.store.port}`,
        instance: config.store.instance,
      },
      providers: {
        llm: llm ? reportProvider(llm) : null,
        embedding: reportProvider(this.#deps.embeddingProvider),
      },
      resolver: this.#deps.resolver.stats(),
      traversal: this.#deps.search.stats(),
      ontology: {
        loaded: this.#deps.ontology.isLoaded,
        concepts: this.#deps.ontology.listConcepts().length,
      },
      jobs: this.#deps.jobs?.list() ?? [],
    };
  }
}
