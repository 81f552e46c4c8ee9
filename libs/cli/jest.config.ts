export default {
  displayName: 'cli',
  testEnvironment: 'node',
  transform: {
    '^.+\\.tsx?$': [
      '@swc/jest',
      {
        jsc: {
          parser: { syntax: 'typescript' },
          target: 'es2022',
        },
      },
    ],
  },
  moduleFileExtensions: ['ts', 'js', 'json'],
  moduleNameMapper: {
    '^(\\.{1,2}/.*)\\.js$': '$1',
    '^@keyward/ipc$': '<rootDir>/../ipc/src/index.ts',
    '^@keyward/storage$': '<rootDir>/../storage/src/index.ts',
    '^@keyward/daemon$': '<rootDir>/../daemon/src/index.ts',
  },
  testMatch: ['<rootDir>/src/__tests__/**/*.spec.ts'],
};
