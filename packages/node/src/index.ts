/**
 * @gridtext/node
 *
 * Node.js output for gridtext tables: color detection from the environment
 * and the output stream, and a one-call writer.
 */

export {
  type ColorEnv,
  type ColorStream,
  colorSupportFromNodeEnv,
  parseForceColorValue,
} from "./colorSupport.js";
export { type TableStream, writeTable } from "./writeTable.js";
