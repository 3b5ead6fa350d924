import test from 'node:test';
import assert from 'node:assert/strict';
import { ZodError } from 'zod';
import { buildFeaturesConfig, buildPreprocessConfig, DEFAULT_PATHS, getSeasonLabel } from '../src/config.js';

test('buildFeaturesConfig falls back to the default directories', () => {
  assert.deepEqual(buildFeaturesConfig([]), {
    inputDir: DEFAULT_PATHS.preprocessedDir,
    outputDir: DEFAULT_PATHS.engineeredDir,
    debug: false,
  });
});

test('buildFeaturesConfig reads --key value, --key=value and bare flags', () => {
  assert.deepEqual(buildFeaturesConfig(['--input-dir', 'in', '--output-dir=out', '--debug']), {
    inputDir: 'in',
    outputDir: 'out',
    debug: true,
  });
});

test('buildPreprocessConfig rejects a flag missing its value', () => {
  assert.throws(() => buildPreprocessConfig(['--input', '--debug']), ZodError);
  assert.throws(() => buildPreprocessConfig(['--debug', 'maybe']), ZodError);
});

test('getSeasonLabel spans the two calendar years', () => {
  assert.equal(getSeasonLabel(2021), '2020-2021');
});
