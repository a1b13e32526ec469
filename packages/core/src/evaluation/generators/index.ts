export {
  TestCaseGenerator,
  deriveTestCaseName,
  type TestCaseGeneratorOptions,
} from './test-case-generator.js';
