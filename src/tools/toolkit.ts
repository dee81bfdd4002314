/**
 * tools/toolkit.ts
 *
 * Information about the server itself: its version and the release notes
 * shipped in data/releases.json.
 */

import * as fs from 'fs';
import * as path from 'path';
import Ajv from 'ajv';
import { ReleaseData, ToolModule, ToolResult } from '../core/types';
import { registry } from '../core/registry';
import { ExecutionError, ParseError, errorMessage } from '../core/errors';
import { scopedLogger } from '../core/logger';
import { PROJECT_ROOT } from '../core/config';
import { field, isRecord, optionalString } from '../core/values';

const log = scopedLogger('tools/toolkit');

export const RELEASES_PATH = path.join(PROJECT_ROOT, 'data', 'releases.json');
const PACKAGE_PATH = path.join(PROJECT_ROOT, 'package.json');

const RELEASE_DATA_SCHEMA = {
  type: 'object',
  required: ['currentVersion', 'releases'],
  additionalProperties: false,
  properties: {
    currentVersion: { type: 'string' },
    releases: {
      type: 'array',
      items: {
        type: 'object',
        required: ['version', 'sections'],
        additionalProperties: false,
        properties: {
          version: { type: 'string' },
          date: { type: 'string', pattern: '^\\d{4}-\\d{2}-\\d{2}$' },
          sections: {
            type: 'array',
            items: {
              type: 'object',
              required: ['title', 'items'],
              additionalProperties: false,
              properties: {
                title: { type: 'string' },
                items: { type: 'array', items: { type: 'string' } }
              }
            }
          }
        }
      }
    }
  }
};

const ajv = new Ajv({ allErrors: true });
const validateReleaseData = ajv.compile<ReleaseData>(RELEASE_DATA_SCHEMA);

export function loadReleaseData(file: string = RELEASES_PATH): ReleaseData {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (e) {
    throw new ParseError(`Cannot read release notes: ${errorMessage(e)}`, { file });
  }
  if (!validateReleaseData(parsed)) {
    throw new ParseError('Release notes file is invalid', { file, errors: validateReleaseData.errors });
  }
  return parsed;
}

export function readPackageInfo(file: string = PACKAGE_PATH): { name: string; version: string } {
  const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
  return {
    name: isRecord(parsed) ? field(parsed, 'name') || 'pc-toolkit-server' : 'pc-toolkit-server',
    version: isRecord(parsed) ? field(parsed, 'version') || '0.0.0' : '0.0.0'
  };
}

let releaseData: ReleaseData | null = null;

function releases(): ReleaseData {
  if (!releaseData) {
    releaseData = loadReleaseData();
    log.debug({ count: releaseData.releases.length }, 'Release notes loaded');
  }
  return releaseData;
}

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

async function handleVersion(): Promise<ToolResult> {
  const pkg = readPackageInfo();
  return {
    success: true,
    data: { ...pkg, releaseNotesVersion: releases().currentVersion },
    durationMs: 0
  };
}

async function handleChangelog(args: Record<string, unknown>): Promise<ToolResult> {
  const version = optionalString('toolkit.changelog', args, 'version');
  const data = releases();

  if (version === undefined) {
    return { success: true, data: { releases: data.releases }, durationMs: 0 };
  }

  const wanted = version.replace(/^v/i, '');
  const match = data.releases.find(r => r.version === wanted);
  if (!match) {
    throw new ExecutionError('toolkit.changelog', `No release notes for version ${version}`, {
      available: data.releases.map(r => r.version)
    });
  }
  return { success: true, data: { releases: [match] }, durationMs: 0 };
}

// ---------------------------------------------------------------------------
// Module definition + registration
// ---------------------------------------------------------------------------

const toolkit: ToolModule = {
  name: 'toolkit',

  tools: [
    {
      name: 'toolkit.version',
      description: 'Get the name and version of this server and the latest release-notes version.',
      parameters: { type: 'object', properties: {}, additionalProperties: false }
    },
    {
      name: 'toolkit.changelog',
      description: 'Get the release notes, newest first, or only those of one version (e.g. "2.9").',
      parameters: {
        type: 'object',
        properties: {
          version: { type: 'string', description: 'Release version, with or without a leading "v"' }
        },
        additionalProperties: false
      }
    }
  ],

  async execute(toolName: string, args: Record<string, unknown>): Promise<ToolResult> {
    switch (toolName) {
      case 'toolkit.version':   return handleVersion();
      case 'toolkit.changelog': return handleChangelog(args);
      default:
        throw new ExecutionError('toolkit', `Unknown tool: ${toolName}`);
    }
  }
};

registry.register(toolkit);
export default toolkit;
