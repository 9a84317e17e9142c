import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, readdirSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  consumeSuggestion,
  getStateDir,
  parseHookPayload,
  projectKey,
  runHook,
  suggestionPath,
} from '../src/index.js';

const PROJECT = '/work/shop-api';

describe('paths', () => {
  it('derives the project key like the host tool', () => {
    expect(projectKey('/work/shop_api.v2')).toBe('-work-shop-api-v2');
  });

  it('places suggestions under the state directory', () => {
    expect(suggestionPath('/state', PROJECT)).toBe(join('/state', 'suggestions', '-work-shop-api.md'));
  });

  it('honours SHEPHERD_HOME', () => {
    expect(getStateDir({ SHEPHERD_HOME: '/custom' })).toBe('/custom');
  });
});

describe('parseHookPayload', () => {
  it('accepts the host payload and keeps unknown fields', () => {
    const payload = parseHookPayload(
      JSON.stringify({ session_id: 'abc', cwd: PROJECT, prompt: 'hi', hook_event_name: 'UserPromptSubmit' })
    );

    expect(payload).toMatchObject({ cwd: PROJECT, session_id: 'abc', hook_event_name: 'UserPromptSubmit' });
  });

  it('returns null for invalid JSON or a missing cwd', () => {
    expect(parseHookPayload('not json')).toBeNull();
    expect(parseHookPayload(JSON.stringify({ prompt: 'hi' }))).toBeNull();
    expect(parseHookPayload(JSON.stringify({ cwd: '' }))).toBeNull();
  });
});

describe('consuming suggestions', () => {
  let stateDir: string;

  function stage(text: string): void {
    mkdirSync(join(stateDir, 'suggestions'), { recursive: true });
    writeFileSync(suggestionPath(stateDir, PROJECT), text);
  }

  beforeEach(() => {
    stateDir = mkdtempSync(join(tmpdir(), 'shepherd-hook-'));
  });

  afterEach(() => {
    rmSync(stateDir, { recursive: true, force: true });
  });

  it('returns null when nothing is pending', async () => {
    expect(await consumeSuggestion(stateDir, PROJECT)).toBeNull();
  });

  it('returns the trimmed text once and removes the file', async () => {
    stage('\nadd unit tests\n');

    expect(await consumeSuggestion(stateDir, PROJECT)).toBe('add unit tests');
    expect(await consumeSuggestion(stateDir, PROJECT)).toBeNull();
    expect(readdirSync(join(stateDir, 'suggestions'))).toEqual([]);
  });

  it('treats a blank file as nothing pending', async () => {
    stage('  \n');

    expect(await consumeSuggestion(stateDir, PROJECT)).toBeNull();
    expect(readdirSync(join(stateDir, 'suggestions'))).toEqual([]);
  });

  it('only serves the project it was written for', async () => {
    stage('add unit tests');

    expect(await consumeSuggestion(stateDir, '/work/billing')).toBeNull();
    expect(await consumeSuggestion(stateDir, PROJECT)).toBe('add unit tests');
  });

  describe('runHook', () => {
    it('prints the suggestion followed by a blank line', async () => {
      stage('add unit tests\n');

      expect(await runHook(JSON.stringify({ cwd: PROJECT }), stateDir)).toBe('add unit tests\n\n');
      expect(await runHook(JSON.stringify({ cwd: PROJECT }), stateDir)).toBe('');
    });

    it('prints nothing for an unusable payload and leaves the suggestion pending', async () => {
      stage('add unit tests');

      expect(await runHook('{', stateDir)).toBe('');
      expect(await consumeSuggestion(stateDir, PROJECT)).toBe('add unit tests');
    });
  });
});
