export { createDryRunAdapter, type DryRunAdapter, type DryRunAdapterConfig } from "./adapter";
