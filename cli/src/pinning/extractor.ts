import fs from 'fs';
import path from 'path';
import { OperationalError, describeError } from '../utils/errors';
import { type LineLayout, type ReferenceKind, type WorkflowReference, classify } from './references';

interface ScalarValue {
  value: string;
  layout: LineLayout;
}

interface BlockState {
  indent: number;
}

/**
 * Extraction state. A block opens on a `container:` / `services:` key with no
 * inline value and closes at the next significant line indented at or left of
 * the key.
 */
interface ExtractorState {
  container: BlockState | null;
  services: BlockState | null;
}

const KEY_PATTERN = /^(["']?)([A-Za-z_][\w.-]*)\1\s*:(?=\s|$)/;
const FLOW_IMAGE_KEY = /[{,]\s*(["']?)image\1\s*:\s*/g;

function findComment(text: string): number {
  for (let i = 0; i < text.length; i += 1) {
    if (text[i] === '#' && (i === 0 || /\s/.test(text[i - 1]))) {
      return i;
    }
  }
  return -1;
}

/** Reads the block-style scalar starting at `start`. */
export function readScalar(line: string, start: number): ScalarValue {
  let position = start;
  while (position < line.length && /\s/.test(line[position])) {
    position += 1;
  }

  const opening = line[position];
  if (opening === '"' || opening === "'") {
    const closing = line.indexOf(opening, position + 1);
    if (closing >= 0) {
      const after = line.slice(closing + 1);
      const hash = findComment(after);
      return {
        value: line.slice(position + 1, closing),
        layout: {
          valueStart: position + 1,
          valueEnd: closing,
          quote: opening,
          comment: hash >= 0 ? after.slice(hash).trim() : undefined,
        },
      };
    }
  }

  const rest = line.slice(position);
  const hash = findComment(rest);
  const body = hash >= 0 ? rest.slice(0, hash) : rest;
  const value = body.trimEnd();
  return {
    value,
    layout: {
      valueStart: position,
      valueEnd: position + value.length,
      quote: '',
      comment: hash >= 0 ? rest.slice(hash).trim() : undefined,
    },
  };
}

/** Finds `image:` inside a `{ ... }` flow mapping that starts at `start`. */
export function readFlowImage(line: string, start: number): ScalarValue | null {
  FLOW_IMAGE_KEY.lastIndex = start;
  const key = FLOW_IMAGE_KEY.exec(line);
  if (!key) {
    return null;
  }

  const position = key.index + key[0].length;
  const opening = line[position];
  if (opening === '"' || opening === "'") {
    const closing = line.indexOf(opening, position + 1);
    if (closing >= 0) {
      return {
        value: line.slice(position + 1, closing),
        layout: { valueStart: position + 1, valueEnd: closing, quote: opening },
      };
    }
  }

  let end = position;
  while (end < line.length && line[end] !== ',' && line[end] !== '}' && !(line[end] === '#' && /\s/.test(line[end - 1]))) {
    end += 1;
  }
  const value = line.slice(position, end).trimEnd();
  return { value, layout: { valueStart: position, valueEnd: position + value.length, quote: '' } };
}

function indentationOf(line: string): number {
  const match = /^[ \t]*/.exec(line);
  return match ? match[0].length : 0;
}

function imageKind(state: ExtractorState): ReferenceKind | null {
  const { container, services } = state;
  if (container && services) {
    return services.indent > container.indent ? 'serviceImage' : 'containerImage';
  }
  if (services) return 'serviceImage';
  if (container) return 'containerImage';
  return null;
}

export function extractReferences(content: string, file: string): WorkflowReference[] {
  const references: WorkflowReference[] = [];
  const state: ExtractorState = { container: null, services: null };

  const emit = (kind: ReferenceKind, scalar: ScalarValue, lineNumber: number): void => {
    const { status, reason } = classify(kind, scalar.value);
    references.push({
      file,
      lineNumber,
      kind,
      rawValue: scalar.value,
      pinStatus: status,
      reason,
      layout: scalar.layout,
    });
  };

  content.split('\n').forEach((rawLine, index) => {
    const line = rawLine.replace(/\r$/, '');
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      return;
    }

    const indent = indentationOf(line);
    if (state.container && indent <= state.container.indent) {
      state.container = null;
    }
    if (state.services && indent <= state.services.indent) {
      state.services = null;
    }

    let keyStart = indent;
    while (line.startsWith('- ', keyStart)) {
      keyStart += 1;
      while (line[keyStart] === ' ') keyStart += 1;
    }

    const match = KEY_PATTERN.exec(line.slice(keyStart));
    if (!match) {
      return;
    }
    const key = match[2];
    const valueStart = keyStart + match[0].length;
    const lineNumber = index + 1;
    const scalar = readScalar(line, valueStart);
    const isFlowMapping = scalar.layout.quote === '' && scalar.value.startsWith('{');

    switch (key) {
      case 'uses':
        emit('action', scalar, lineNumber);
        return;
      case 'container':
        if (isFlowMapping) {
          const image = readFlowImage(line, scalar.layout.valueStart);
          if (image) emit('containerImage', image, lineNumber);
        } else if (scalar.value) {
          emit('containerImage', scalar, lineNumber);
        } else {
          state.container = { indent };
        }
        return;
      case 'services':
        if (!scalar.value) {
          state.services = { indent };
        }
        return;
      case 'image': {
        const kind = imageKind(state);
        if (kind) emit(kind, scalar, lineNumber);
        return;
      }
      default:
        if (isFlowMapping && state.services) {
          const image = readFlowImage(line, scalar.layout.valueStart);
          if (image) emit('serviceImage', image, lineNumber);
        }
    }
  });

  return references;
}

/** `*.yml` / `*.yaml` files under `dir`, recursively, in sorted order. */
export async function listWorkflowFiles(dir: string): Promise<string[]> {
  let stat: fs.Stats;
  try {
    stat = await fs.promises.stat(dir);
  } catch (error: unknown) {
    throw new OperationalError(`Workflow directory ${dir} is not readable: ${describeError(error)}`);
  }
  if (!stat.isDirectory()) {
    throw new OperationalError(`${dir} is not a directory`);
  }

  const files: string[] = [];
  const walk = async (current: string): Promise<void> => {
    const entries = await fs.promises.readdir(current, { withFileTypes: true });
    for (const entry of entries) {
      const full = path.join(current, entry.name);
      if (entry.isDirectory()) {
        await walk(full);
      } else if (entry.isFile() && /\.ya?ml$/i.test(entry.name)) {
        files.push(full);
      }
    }
  };

  try {
    await walk(dir);
  } catch (error: unknown) {
    throw new OperationalError(`Could not list ${dir}: ${describeError(error)}`);
  }
  return files.sort();
}

export async function extractFromDirectory(dir: string): Promise<WorkflowReference[]> {
  const references: WorkflowReference[] = [];
  for (const file of await listWorkflowFiles(dir)) {
    let content: string;
    try {
      content = await fs.promises.readFile(file, 'utf-8');
    } catch (error: unknown) {
      throw new OperationalError(`Cannot read ${file}: ${describeError(error)}`);
    }
    references.push(...extractReferences(content, file));
  }
  return references;
}
