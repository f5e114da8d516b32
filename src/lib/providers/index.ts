import type { ProviderSettings } from "../config";
import { AwsProvider, type ProviderClientOptions } from "./aws";
import { AzureProvider } from "./azure";
import type { CloudProvider } from "./types";

export type { CloudProvider } from "./types";
export { AwsProvider } from "./aws";
export { AzureProvider } from "./azure";

export function createProvider(settings: ProviderSettings, options: ProviderClientOptions = {}): CloudProvider {
  switch (settings.kind) {
    case "aws":
      return new AwsProvider({ region: settings.region, profile: settings.profile }, options);
    case "azure":
      return new AzureProvider({ resourceGroup: settings.resourceGroup, subscription: settings.subscription }, options);
  }
}
