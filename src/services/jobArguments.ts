import { readFile, stat } from 'fs/promises';
import { basename } from 'path';
import { CONFIG_FIELD, CONFIG_FILENAME } from '../config/env';
import type { ConfigObject, FileInput, JobArgument, LaunchForm, OutputPath } from '../types';

export const fileInput = (name: string, path: string): FileInput => ({ kind: 'file', name, path });

export const outputPath = (name: string, path: string): OutputPath => ({ kind: 'output', name, path });

export const configObject = (properties: Record<string, unknown>): ConfigObject => ({
  kind: 'config',
  properties,
});

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

// input* uploads, output* is a plain path, other strings upload only when the
// file exists, objects become the config upload.
export async function classifyArguments(args: Record<string, unknown>): Promise<JobArgument[]> {
  const classified: JobArgument[] = [];

  for (const [name, value] of Object.entries(args)) {
    if (typeof value === 'string') {
      if (name.startsWith('input')) {
        classified.push(fileInput(name, value));
      } else if (name.startsWith('output')) {
        classified.push(outputPath(name, value));
      } else if (await isFile(value)) {
        classified.push(fileInput(name, value));
      }
    } else if (isPlainObject(value)) {
      classified.push(configObject(value));
    }
  }

  return classified;
}

export async function buildLaunchForm(args: JobArgument[]): Promise<LaunchForm> {
  const form: LaunchForm = { fields: {}, files: {} };

  for (const arg of args) {
    switch (arg.kind) {
      case 'file':
        form.files[arg.name] = {
          filename: basename(arg.path),
          content: await readFile(arg.path),
        };
        break;
      case 'output':
        form.fields[arg.name] = arg.path;
        break;
      case 'config':
        form.files[CONFIG_FIELD] = {
          filename: CONFIG_FILENAME,
          content: Buffer.from(JSON.stringify(arg.properties)),
        };
        break;
    }
  }

  return form;
}
