import type { Config } from 'jest';

const config: Config = {
  displayName: 'crosstalk-cli',
  preset: 'ts-jest',
  testEnvironment: 'node',
  roots: ['<rootDir>/src'],
  testMatch: ['**/*.spec.ts'],
  moduleFileExtensions: ['ts', 'js', 'json', 'node'],
  moduleNameMapper: {
    '^crosstalk-core$': '<rootDir>/../core/src/index.ts',
    '^langfuse$': '<rootDir>/../core/src/__mocks__/langfuse.ts',
  },
  transform: {
    '^.+\\.ts$': ['ts-jest', {
      tsconfig: '<rootDir>/../../tsconfig.json',
    }],
  },
  clearMocks: true,
};

export default config;
