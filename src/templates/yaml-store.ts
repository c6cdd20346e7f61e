import { readdir, readFile } from 'fs/promises';
import { join, extname } from 'path';
import yaml from 'js-yaml';
import { createChildLogger } from '../utils/logger.js';
import { errorMessage } from '../types/index.js';
import type {
  TemplateDocument,
  TemplateDocumentSource,
  TemplateKind,
  TemplateLoadError,
  TemplateSourceResult,
} from './types.js';

const logger = createChildLogger('yaml-store');

const SECTIONS: ReadonlyArray<[string, TemplateKind]> = [
  ['providers', 'provider'],
  ['channels', 'channel'],
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read template documents from one YAML file's text.
 *
 * Each file holds `providers:` and `channels:` lists whose entries are
 * single-key maps from template name to template body.
 */
export function parseTemplateFile(content: string, source: string): TemplateSourceResult {
  const documents: TemplateDocument[] = [];
  const errors: TemplateLoadError[] = [];

  let parsed: unknown;
  try {
    parsed = yaml.load(content, { filename: source });
  } catch (error) {
    return { documents, errors: [{ template: source, source, message: errorMessage(error) }] };
  }

  if (parsed === undefined || parsed === null) {
    return { documents, errors };
  }
  if (!isRecord(parsed)) {
    return {
      documents,
      errors: [{ template: source, source, message: 'Template file must contain a map' }],
    };
  }

  for (const [section, kind] of SECTIONS) {
    const entries = parsed[section];
    if (entries === undefined || entries === null) {
      continue;
    }
    if (!Array.isArray(entries)) {
      errors.push({ template: source, source, message: `"${section}" must be a list` });
      continue;
    }

    entries.forEach((entry: unknown, index) => {
      const names = isRecord(entry) ? Object.keys(entry) : [];
      const [name] = names;
      if (!isRecord(entry) || name === undefined || names.length !== 1) {
        errors.push({
          template: `${section}[${index}]`,
          kind,
          source,
          message: 'Each template entry must be a single-key map of name to body',
        });
        return;
      }
      documents.push({ name, kind, body: entry[name], source });
    });
  }

  return { documents, errors };
}

/**
 * Template documents from a directory of .yaml / .yml files, read in name order
 */
export class YamlConfigurationStore implements TemplateDocumentSource {
  constructor(private directory: string) {}

  async load(): Promise<TemplateSourceResult> {
    const files = (await readdir(this.directory))
      .filter((file) => ['.yaml', '.yml'].includes(extname(file)))
      .sort();

    const result: TemplateSourceResult = { documents: [], errors: [] };

    for (const file of files) {
      const path = join(this.directory, file);
      const content = await readFile(path, 'utf-8');
      const parsed = parseTemplateFile(content, file);
      result.documents.push(...parsed.documents);
      result.errors.push(...parsed.errors);
    }

    logger.info(
      { directory: this.directory, files: files.length, documents: result.documents.length },
      'Read template files'
    );

    return result;
  }
}
