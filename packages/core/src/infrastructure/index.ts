export { createCommandRegistry } from "./command-registry.js";
export type { CommandRegistry, CommandRegistryOptions } from "./command-registry.js";
