/**
 * @keyhop/server
 *
 * HTTP surface and startup for keyhop.
 */

export { createServer, INTERNAL_ERROR_BODY, type ServerOptions } from "./server.js";
export { startKeyhop, type StartOptions, type KeyhopInstance } from "./app.js";
export { parseBindAddress, type BindAddress } from "./bind-address.js";
export { createProgram, VERSION, type CliOptions } from "./program.js";
export { escapeMarkup, renderIndexPage, renderListPage, renderOpenSearch } from "./pages.js";
