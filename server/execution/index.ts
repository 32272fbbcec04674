export type { Provider } from "./types";
export { DryRunProvider } from "./dryRunProvider";
