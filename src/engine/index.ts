import { BuiltinTool } from './builtin.js';
import { ExiftoolTool } from './exiftool.js';
import type { EngineName, MetadataTool } from '../types.js';

export { BuiltinTool, rewriteJpeg } from './builtin.js';
export { ExiftoolTool, toolFailure, SPAWN_FAILURE_EXIT_CODE } from './exiftool.js';
export { parseToolArguments } from './arguments.js';
export type { ScrubInstruction, TagAssignment, TagReference } from './arguments.js';

export interface ToolOptions {
  /** Binary used by the exiftool engine */
  exiftoolPath?: string;
}

export function createTool(engine: EngineName, options: ToolOptions = {}): MetadataTool {
  return engine === 'builtin' ? new BuiltinTool() : new ExiftoolTool(options.exiftoolPath);
}
