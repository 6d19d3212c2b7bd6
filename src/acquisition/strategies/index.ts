import type { AcquisitionStrategy, KnownStrategyName } from "../types";
import { BrowserSearchStrategy, type BrowserSearchConfig } from "./browser-search";
import { DirectUrlStrategy, loadKnownUrls } from "./direct-url";
import { SearchEngineStrategy, type SearchEngineConfig } from "./search-engine";
import { StructuredApiStrategy, type StructuredApiConfig } from "./structured-api";

export interface StrategySettings {
  structuredApi: StructuredApiConfig;
  directUrl: { knownUrlsPath: string };
  searchEngine: SearchEngineConfig;
  browserSearch: BrowserSearchConfig;
}

/** Builds only the strategies that are named, so disabled ones never load their data or browser. */
export const createStrategies = (
  names: readonly KnownStrategyName[],
  settings: StrategySettings,
): Array<AcquisitionStrategy<unknown>> =>
  names.map((name): AcquisitionStrategy<unknown> => {
    switch (name) {
      case "structured_api":
        return new StructuredApiStrategy(settings.structuredApi);
      case "direct_url":
        return new DirectUrlStrategy(loadKnownUrls(settings.directUrl.knownUrlsPath));
      case "search_engine":
        return new SearchEngineStrategy(settings.searchEngine);
      case "browser_search":
        return new BrowserSearchStrategy(settings.browserSearch);
    }
  });

export { BrowserSearchStrategy, DirectUrlStrategy, SearchEngineStrategy, StructuredApiStrategy };
