export { Mailbox } from "./mailbox.js";
export { MemoryLoginStore, type MemoryLoginStoreOptions } from "./memory-login-store.js";
export { MemoryLoginStoreRegistry, defaultMemoryLoginStoreRegistry } from "./registry.js";
