import type { Config } from 'jest';

const config: Config = {
  testEnvironment: 'node',
  clearMocks: true,
  verbose: false,
  projects: ['<rootDir>/packages/core', '<rootDir>/packages/cli'],
};

export default config;
