import type { Config } from 'jest';

const config: Config = {
  displayName: 'crosstalk-core',
  preset: 'ts-jest',
  testEnvironment: 'node',
  roots: ['<rootDir>/src'],
  testMatch: ['**/*.spec.ts'],
  moduleFileExtensions: ['ts', 'js', 'json', 'node'],
  moduleNameMapper: {
    '^crosstalk-core$': '<rootDir>/src/index.ts',
    '^langfuse$': '<rootDir>/src/__mocks__/langfuse.ts',
  },
  transform: {
    '^.+\\.ts$': ['ts-jest', {
      tsconfig: '<rootDir>/../../tsconfig.json',
    }],
  },
  clearMocks: true,
};

export default config;
