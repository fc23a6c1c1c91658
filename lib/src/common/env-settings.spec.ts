import {
  Env,
  getEnvVariableBoolean,
  getEnvVariableNumber,
  getEnvVariableString,
  printConfigSettings,
} from './env-settings';

describe('Env Settings Unit Tests', () => {
  const mockEnv: Env = {
    MY_VAR: 'my-value',
    EMPTY_VAR: '',
    UNDEFINED_VAR: undefined,
    NUMBER_VAR: '42',
    INVALID_NUMBER_VAR: 'forty-two',
    TRUE_VAR: 'TRUE',
    ONE_VAR: '1',
    FALSE_VAR: 'false',
    ZERO_VAR: '0',
    INVALID_BOOLEAN_VAR: 'yes',
  };

  describe('getEnvVariableString', () => {
    it('should retrieve an existing environment variable', () => {
      expect(getEnvVariableString(mockEnv, 'MY_VAR')).toBe('my-value');
    });

    it('should use a default value if the variable is empty', () => {
      expect(getEnvVariableString(mockEnv, 'EMPTY_VAR', 'default')).toBe(
        'default',
      );
    });

    it('should throw an error if the variable is empty', () => {
      expect(() => getEnvVariableString(mockEnv, 'EMPTY_VAR')).toThrow(
        'The environment variable EMPTY_VAR must be a non-empty string.',
      );
    });

    it('should throw an error if the variable is not found', () => {
      expect(() => getEnvVariableString(mockEnv, 'UNDEFINED_VAR')).toThrow(
        'The environment variable UNDEFINED_VAR must be a non-empty string.',
      );
    });
  });

  describe('getEnvVariableNumber', () => {
    it('should parse a number', () => {
      expect(getEnvVariableNumber(mockEnv, 'NUMBER_VAR', 1)).toBe(42);
    });

    it('should use the default value if the variable is missing', () => {
      expect(getEnvVariableNumber(mockEnv, 'UNDEFINED_VAR', 7)).toBe(7);
    });

    it('should throw an error for an invalid number', () => {
      expect(() =>
        getEnvVariableNumber(mockEnv, 'INVALID_NUMBER_VAR', 1),
      ).toThrow('The environment variable INVALID_NUMBER_VAR must be a number.');
    });

    it('should throw an error if the variable is missing and there is no default', () => {
      expect(() => getEnvVariableNumber(mockEnv, 'EMPTY_VAR')).toThrow(
        'The environment variable EMPTY_VAR must be a number.',
      );
    });
  });

  describe('getEnvVariableBoolean', () => {
    const cases: [field: string, expected: boolean][] = [
      ['TRUE_VAR', true],
      ['ONE_VAR', true],
      ['FALSE_VAR', false],
      ['ZERO_VAR', false],
    ];

    it.each(cases)('should parse %s as %s', (field, expected) => {
      expect(getEnvVariableBoolean(mockEnv, field)).toBe(expected);
    });

    it('should use the default value if the variable is missing', () => {
      expect(getEnvVariableBoolean(mockEnv, 'UNDEFINED_VAR', true)).toBe(true);
    });

    it('should throw an error for an invalid boolean', () => {
      expect(() =>
        getEnvVariableBoolean(mockEnv, 'INVALID_BOOLEAN_VAR', true),
      ).toThrow(
        'The environment variable INVALID_BOOLEAN_VAR must be a boolean.',
      );
    });
  });

  describe('printConfigSettings', () => {
    const map = [
      { constantName: 'DB_SCHEMA', default: 'public' },
      { constantName: 'MAX_ATTEMPTS', default: 10 },
      { constantName: 'ENABLED', default: true },
    ];

    it('should print every setting with its default value', () => {
      expect(printConfigSettings(map, 'TEST_')).toBe(
        'TEST_DB_SCHEMA=public\nTEST_MAX_ATTEMPTS=10\nTEST_ENABLED=true\n',
      );
    });

    it('should print the overrides with or without the prefix', () => {
      expect(
        printConfigSettings(map, 'TEST_', {
          DB_SCHEMA: 'telematics',
          TEST_MAX_ATTEMPTS: '3',
        }),
      ).toBe(
        'TEST_DB_SCHEMA=telematics\nTEST_MAX_ATTEMPTS=3\nTEST_ENABLED=true\n',
      );
    });
  });
});
