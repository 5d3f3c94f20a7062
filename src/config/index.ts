export { readCapabilityConfig } from "./env";
