/**
 * Repository settings
 *
 * Read from an optional YAML file at the repository root and validated
 * against SETTINGS_SCHEMA. Missing keys take their defaults; a missing
 * file means all defaults.
 *
 * @module config
 */

import Ajv from 'ajv';
import type { ErrorObject, JSONSchemaType } from 'ajv';
import * as yaml from 'js-yaml';
import type { IWorkspace } from '../workspace/workspace';
import type { ReleaseSettings, SettingsFile } from './config.types';
import { SettingsError } from './errors';
import { createLogger } from '../logger';

const logger = createLogger('[Settings] ');

export const SETTINGS_FILE = '.relkit.yml';

export const DEFAULT_SETTINGS: Readonly<Omit<ReleaseSettings, 'projectName' | 'editor'>> = {
  botLogin: 'release-bot',
  changelogFile: 'CHANGELOG.md',
  gitignoreEntry: '/_build/',
  restyleCheck: 'common / restyled',
  selfCheck: 'Verify release/signatures',
  restyleCommand: 'hub-restyled',
  validateCommand: null,
};

export const DEFAULT_EDITOR = 'vim';

const nonEmpty = { type: 'string', nullable: true, minLength: 1 } as const;

export const SETTINGS_SCHEMA: JSONSchemaType<SettingsFile> = {
  type: 'object',
  properties: {
    botLogin: nonEmpty,
    changelogFile: nonEmpty,
    gitignoreEntry: nonEmpty,
    restyleCheck: nonEmpty,
    selfCheck: nonEmpty,
    restyleCommand: nonEmpty,
    validateCommand: nonEmpty,
    projectName: nonEmpty,
    editor: nonEmpty,
  },
  required: [],
  additionalProperties: false,
};

const ajv = new Ajv({ allErrors: true });
const validateSettingsFile = ajv.compile(SETTINGS_SCHEMA);

function describeError(error: ErrorObject): string {
  const location = error.instancePath || '/';
  const extra = typeof error.params['additionalProperty'] === 'string' ? ` (${error.params['additionalProperty']})` : '';
  return `${location} ${error.message ?? 'is invalid'}${extra}`;
}

/**
 * Parses settings file contents. Throws SettingsError listing every
 * violation.
 */
export function parseSettings(content: string, file: string = SETTINGS_FILE): SettingsFile {
  let data: unknown;
  try {
    data = yaml.load(content);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SettingsError(file, [message]);
  }
  if (data === undefined || data === null) {
    return {};
  }
  if (!validateSettingsFile(data)) {
    throw new SettingsError(file, (validateSettingsFile.errors ?? []).map(describeError));
  }
  return data;
}

export type SettingsContext = {
  /** Default project name, usually the repository name */
  repositoryName: string;
  /** Editor from the environment */
  editor?: string | undefined;
};

export function resolveSettings(file: SettingsFile, context: SettingsContext): ReleaseSettings {
  return {
    botLogin: file.botLogin ?? DEFAULT_SETTINGS.botLogin,
    changelogFile: file.changelogFile ?? DEFAULT_SETTINGS.changelogFile,
    gitignoreEntry: file.gitignoreEntry ?? DEFAULT_SETTINGS.gitignoreEntry,
    restyleCheck: file.restyleCheck ?? DEFAULT_SETTINGS.restyleCheck,
    selfCheck: file.selfCheck ?? DEFAULT_SETTINGS.selfCheck,
    restyleCommand: file.restyleCommand ?? DEFAULT_SETTINGS.restyleCommand,
    validateCommand: file.validateCommand ?? DEFAULT_SETTINGS.validateCommand,
    projectName: file.projectName ?? context.repositoryName,
    editor: file.editor ?? (context.editor || DEFAULT_EDITOR),
  };
}

/**
 * Settings of the repository checked out in `workspace`.
 */
export async function loadSettings(workspace: IWorkspace, context: SettingsContext): Promise<ReleaseSettings> {
  const content = await workspace.readFile(SETTINGS_FILE);
  if (content === null) {
    logger.debug(`No ${SETTINGS_FILE}; using defaults`);
    return resolveSettings({}, context);
  }
  return resolveSettings(parseSettings(content), context);
}
