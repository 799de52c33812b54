export * from "./errors.js";
export * from "./types.js";
export * from "./state.js";
export * from "./validation.js";
export { Address, buildSearchText, formatAddress } from "./address.js";
