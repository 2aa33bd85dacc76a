/**
 * Centralized Vitest Setup for strands-docs-mcp
 *
 * Keeps tests off the network: the AWS SDK must never probe the instance
 * metadata service or pick up a developer's credentials.
 */

import { afterAll, beforeAll } from 'vitest';

const savedEnv: Record<string, string | undefined> = {};
const ISOLATED_ENV: Record<string, string> = {
  AWS_EC2_METADATA_DISABLED: 'true',
  AWS_ACCESS_KEY_ID: 'test-access-key',
  AWS_SECRET_ACCESS_KEY: 'test-secret',
};

beforeAll(() => {
  for (const [key, value] of Object.entries(ISOLATED_ENV)) {
    savedEnv[key] = process.env[key];
    process.env[key] = value;
  }
  // Individual suites opt back into log output.
  process.env.STRANDS_DOCS_LOG_LEVEL ??= 'silent';
});

afterAll(() => {
  for (const [key, value] of Object.entries(savedEnv)) {
    if (typeof value === 'string') process.env[key] = value;
    else delete process.env[key];
  }
});
