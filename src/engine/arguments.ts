import { ToolArgumentError } from '../errors.js';

export interface TagReference {
  /** Lower-cased group, '' when the tag was given without one */
  group: string;
  tag: string;
}

export interface TagAssignment extends TagReference {
  value: string;
}

/**
 * The subset of the exiftool command language the scrub emits.
 */
export interface ScrubInstruction {
  overwriteOriginal: boolean;
  preserveTime: boolean;
  /** Lower-cased groups cleared with `-Group:all=`; `all` for `-all=` */
  deletedGroups: Set<string>;
  copyFromSource: boolean;
  copiedTags: TagReference[];
  assignments: TagAssignment[];
  output?: string;
  input: string;
}

function splitTag(name: string): TagReference {
  const colon = name.lastIndexOf(':');
  if (colon === -1) return { group: '', tag: name };
  return { group: name.slice(0, colon).toLowerCase(), tag: name.slice(colon + 1) };
}

/**
 * Parse an argument list into a ScrubInstruction. Tag names following
 * `-tagsFromFile @` are copy requests; `-Tag=value` tokens are assignments.
 */
export function parseToolArguments(args: readonly string[]): ScrubInstruction {
  const instruction: ScrubInstruction = {
    overwriteOriginal: false,
    preserveTime: false,
    deletedGroups: new Set(),
    copyFromSource: false,
    copiedTags: [],
    assignments: [],
    input: '',
  };
  const inputs: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    const next = () => {
      const value = args[++i];
      if (value === undefined) throw new ToolArgumentError('Missing value after', arg);
      return value;
    };

    if (!arg.startsWith('-') || arg === '-') {
      inputs.push(arg);
      continue;
    }

    const lower = arg.toLowerCase();
    if (lower === '-overwrite_original') {
      instruction.overwriteOriginal = true;
    } else if (arg === '-P' || lower === '-preserve') {
      instruction.preserveTime = true;
    } else if (lower === '-tagsfromfile') {
      const source = next();
      if (source !== '@') throw new ToolArgumentError('Only -tagsFromFile @ is supported', source);
      instruction.copyFromSource = true;
    } else if (arg === '-o' || lower === '-out') {
      instruction.output = next();
    } else if (arg.includes('=')) {
      const eq = arg.indexOf('=');
      const ref = splitTag(arg.slice(1, eq));
      const value = arg.slice(eq + 1);
      if (ref.tag.toLowerCase() === 'all' && value === '') {
        instruction.deletedGroups.add(ref.group === '' ? 'all' : ref.group);
      } else {
        instruction.assignments.push({ ...ref, value });
      }
    } else if (instruction.copyFromSource) {
      instruction.copiedTags.push(splitTag(arg.slice(1)));
    } else {
      throw new ToolArgumentError('Unsupported option', arg);
    }
  }

  if (inputs.length !== 1) {
    throw new ToolArgumentError(`Expected exactly one input file, got ${inputs.length}`);
  }
  instruction.input = inputs[0] ?? '';
  return instruction;
}
