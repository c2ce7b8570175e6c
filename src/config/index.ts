export { Config } from "./Config";
export type { PlatformCredentials } from "./Config";
