/**
 * Effect platform layer selection
 *
 * File I/O goes through `@effect/platform`'s FileSystem service; this module
 * supplies the Node.js implementation of it.
 */

import { NodeContext } from "@effect/platform-node";

/**
 * Get the Effect platform layer that provides FileSystem and Path
 *
 * @returns Node.js platform layer
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}
