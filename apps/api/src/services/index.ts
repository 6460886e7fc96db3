/**
 * API Services
 *
 * Business logic layer for link operations.
 */

export { LinkService, parseClicks, type LinkServiceOptions } from "./links.js";
