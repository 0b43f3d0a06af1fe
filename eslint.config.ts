// ==============================================================================
// ESLINT FLAT CONFIG
// Plugin presets with minimal overrides for a Node.js TypeScript service.
// ==============================================================================

import stylistic from '@stylistic/eslint-plugin'
import importX from 'eslint-plugin-import-x'
import jsdoc from 'eslint-plugin-jsdoc'
import sonarjs from 'eslint-plugin-sonarjs'
import tseslint from 'typescript-eslint'

import type { Linter } from 'eslint'

type Rules = Linter.RulesRecord

// ----------------------------------------------------------
// STYLISTIC CONFIG (customize preset)
// ----------------------------------------------------------

const stylisticConfig = stylistic.configs.customize({
  indent: 2, quotes: 'single', semi: true, commaDangle: 'only-multiline', braceStyle: '1tbs',
})

// ----------------------------------------------------------
// RULE SETS
// ----------------------------------------------------------

const stylisticOverrides: Rules = {
  '@stylistic/no-multi-spaces': ['error', { ignoreEOLComments: true }],
  '@stylistic/quote-props': 'off',
  '@stylistic/arrow-parens': 'off',
  '@stylistic/max-statements-per-line': 'off',
  '@stylistic/indent-binary-ops': 'off',
  '@stylistic/padded-blocks': 'off',
  '@stylistic/operator-linebreak': 'off',
}

const structureRules: Rules = {
  'object-shorthand': 'off',
  'no-use-before-define': ['error', { functions: false, classes: true, variables: true }],
  'max-depth': ['warn', 4],
  'max-nested-callbacks': ['warn', 3],
  'max-lines-per-function': ['warn', { max: 100, skipBlankLines: true, skipComments: true }],
  'max-params': ['warn', 5],
}

const jsdocRules: Rules = {
  'jsdoc/check-syntax': 'error',
  'jsdoc/check-param-names': 'error',
  'jsdoc/check-tag-names': ['error', { definedTags: ['example'] }],
  'jsdoc/require-returns': 'off',
  'jsdoc/require-param-type': 'off',
  'jsdoc/require-returns-type': 'off',
  'jsdoc/check-alignment': 'error',
  'jsdoc/empty-tags': 'error',
}

const qualityRules: Rules = {
  'eqeqeq': ['error', 'always', { null: 'ignore' }],
  'no-var': 'error',
  'no-console': 'off',
  'no-constant-condition': ['error', { checkLoops: false }],
  'no-empty': 'error',
  'no-throw-literal': 'error',
  'complexity': ['warn', 15],
  'sonarjs/cognitive-complexity': ['warn', 15],
  'sonarjs/no-identical-functions': 'warn',
  'sonarjs/no-duplicated-branches': 'error',
  'sonarjs/no-collapsible-if': 'warn',
  'sonarjs/no-redundant-jump': 'error',
  'sonarjs/no-same-line-conditional': 'error',
  'sonarjs/no-collection-size-mischeck': 'error',
  'sonarjs/prefer-single-boolean-return': 'warn',
  'sonarjs/no-all-duplicated-branches': 'error',
}

const tsRules: Rules = {
  '@typescript-eslint/no-unused-vars': ['error', { argsIgnorePattern: '^_', varsIgnorePattern: '^_', caughtErrorsIgnorePattern: '^_' }],
  '@typescript-eslint/no-explicit-any': 'error',
  '@typescript-eslint/no-non-null-assertion': 'error',
  '@typescript-eslint/consistent-type-imports': 'error',
}

const importRules: Rules = {
  'import-x/no-duplicates': ['error', { 'prefer-inline': false }],
  'import-x/first': 'error',
}

// Disable rules for tests and test fakes
const relaxedRules: Rules = {
  'max-depth': 'off', 'max-nested-callbacks': 'off', 'max-lines-per-function': 'off',
  'max-params': 'off', 'complexity': 'off',
  'sonarjs/cognitive-complexity': 'off', 'sonarjs/no-identical-functions': 'off',
  'sonarjs/no-duplicated-branches': 'off',
}

const tsLanguageOptions = {
  parser: tseslint.parser,
  parserOptions: { ecmaVersion: 2022, sourceType: 'module' },
} satisfies Linter.Config['languageOptions']

// ==============================================================================
// MAIN CONFIG
// ==============================================================================

export default tseslint.config(
  { ignores: ['node_modules/**', 'dist/**', 'coverage/**', 'logs/**'] },

  // SOURCE FILES
  {
    files: ['src/**/*.ts'],
    ignores: ['src/**/*.test.ts'],
    languageOptions: tsLanguageOptions,
    plugins: { '@stylistic': stylistic, '@typescript-eslint': tseslint.plugin, 'import-x': importX, 'jsdoc': jsdoc, 'sonarjs': sonarjs },
    rules: {
      ...stylisticConfig.rules, ...stylisticOverrides, ...structureRules, ...jsdocRules,
      ...qualityRules, ...tsRules, ...importRules,
    },
  },

  // TESTS AND FAKES
  {
    files: ['src/**/*.test.ts', 'test/**/*.ts'],
    languageOptions: tsLanguageOptions,
    plugins: { '@stylistic': stylistic, '@typescript-eslint': tseslint.plugin, 'import-x': importX, 'sonarjs': sonarjs },
    rules: {
      ...stylisticConfig.rules, ...stylisticOverrides, ...qualityRules, ...tsRules, ...importRules, ...relaxedRules,
      'no-empty': ['error', { allowEmptyCatch: true }],
    },
  },

  // CONFIG FILES
  {
    files: ['*.config.ts'],
    languageOptions: tsLanguageOptions,
    plugins: { '@stylistic': stylistic, '@typescript-eslint': tseslint.plugin, 'import-x': importX },
    rules: {
      ...stylisticConfig.rules, ...stylisticOverrides, ...importRules,
      '@stylistic/semi': 'off',
    },
  },
)
