import js from '@eslint/js';
import tseslint from 'typescript-eslint';
import prettier from 'eslint-config-prettier';

export default [
  js.configs.recommended,
  ...tseslint.configs.recommended,
  prettier,
  {
    rules: {
      '@typescript-eslint/no-explicit-any': 'error',
      '@typescript-eslint/no-unused-vars': [
        'error',
        {
          argsIgnorePattern: '^_',
          varsIgnorePattern: '^_',
        },
      ],
      'no-console': [
        'warn',
        {
          allow: ['warn', 'error'],
        },
      ],
    },
  },
  {
    ignores: ['dist', 'node_modules'],
  },
  // The logger is the one place that talks to the console directly
  {
    files: ['src/dev/logger.ts'],
    rules: {
      'no-console': 'off',
    },
  },
  // Rendering output must depend on the tree alone
  {
    files: ['src/render/**/*.ts', 'src/query/**/*.ts'],
    rules: {
      'no-restricted-properties': [
        'error',
        {
          object: 'Math',
          property: 'random',
          message: 'Rendering must be deterministic; do not use Math.random.',
        },
        {
          object: 'Date',
          property: 'now',
          message: 'Rendering must be deterministic; do not use Date.now.',
        },
      ],
    },
  },
  {
    files: ['benches/**/*.ts', 'tests/**/*.ts', 'test-d/**/*.ts'],
    languageOptions: {
      parser: tseslint.parser,
      parserOptions: {},
    },
  },
];
