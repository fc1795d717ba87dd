import {
  ValidationError,
  parseOverride,
  parseOverrides,
  validateProjectTree,
} from '../../src/utils/validators';

describe('Validators', () => {
  describe('parseOverride', () => {
    it('should keep numbers and booleans typed', () => {
      expect(parseOverride('retries=3')).toEqual({ retries: 3 });
      expect(parseOverride('debug=true')).toEqual({ debug: true });
    });

    it('should read plain words as strings', () => {
      expect(parseOverride('env=prod')).toEqual({ env: 'prod' });
    });

    it('should split on the first equals sign only', () => {
      expect(parseOverride('flags=a=b')).toEqual({ flags: 'a=b' });
    });

    it('should treat an empty value as an empty string', () => {
      expect(parseOverride('target=')).toEqual({ target: '' });
    });

    it('should reject a pair without a key', () => {
      expect(() => parseOverride('=value')).toThrow(ValidationError);
      expect(() => parseOverride('novalue')).toThrow('Override must look like key=value, got "novalue"');
    });
  });

  describe('parseOverrides', () => {
    it('should let later pairs win', () => {
      expect(parseOverrides(['a=1', 'b=x', 'a=2'])).toEqual({ a: 2, b: 'x' });
    });

    it('should return an empty config for no pairs', () => {
      expect(parseOverrides([])).toEqual({});
    });
  });

  describe('validateProjectTree', () => {
    it('should accept sibling projects sharing a name', () => {
      const errors = validateProjectTree({
        name: 'umbrella',
        file: '/w/project.yaml',
        children: [
          { name: 'core', file: '/w/a/project.yaml', children: [] },
          { name: 'core', file: '/w/b/project.yaml', children: [] },
        ],
      });

      expect(errors).toEqual([]);
    });

    it('should report a project nested under an ancestor of the same name', () => {
      const errors = validateProjectTree({
        name: 'umbrella',
        file: '/w/project.yaml',
        children: [
          {
            name: 'core',
            file: '/w/core/project.yaml',
            children: [{ name: 'umbrella', file: '/w/core/inner/project.yaml', children: [] }],
          },
        ],
      });

      expect(errors).toHaveLength(1);
      expect(errors[0].field).toBe('name');
      expect(errors[0].message).toBe(
        'Project "umbrella" in /w/core/inner/project.yaml is nested inside a project of the same name in /w/project.yaml',
      );
    });

    it('should ignore anonymous projects', () => {
      const errors = validateProjectTree({
        name: null,
        file: '/w/project.yaml',
        children: [{ name: null, file: '/w/a/project.yaml', children: [] }],
      });

      expect(errors).toEqual([]);
    });
  });
});
