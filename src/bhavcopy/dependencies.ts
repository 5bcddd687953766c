import { BhavcopyDependencies } from "./build_view";
import { BhavcopyConfig, loadBhavcopyConfig } from "./config";
import { NseArchiveBhavcopyProvider } from "./infrastructure/bhavcopy_provider";
import { ReferenceData } from "./reference/reference_data";
import { TtlCache } from "./reference/ttl_cache";
import { SymbolNameMap } from "./types/domain";

/**
 * Wires the default NSE-backed dependencies. Call once per process (e.g. at
 * Lambda module scope) so the reference caches survive across invocations.
 */
export function createBhavcopyDependencies(
  config: BhavcopyConfig = loadBhavcopyConfig()
): BhavcopyDependencies {
  return {
    provider: new NseArchiveBhavcopyProvider({ config }),
    referenceData: new ReferenceData({
      config,
      indexCache: new TtlCache<ReadonlySet<string>>(),
      nameCache: new TtlCache<SymbolNameMap>(),
    }),
    config,
  };
}
