export default {
  displayName: 'storage',
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
  },
  testMatch: ['<rootDir>/src/**/*.spec.ts'],
};
