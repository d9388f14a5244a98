import { describe, it, expect } from 'vitest';
import {
  applyNamingDefaults,
  generateBuildNames,
  generateServerName,
  generateSnapshotName,
  isValidLabelKey,
  isValidLabelValue,
  isValidServerName
} from '../naming';
import { BuilderConfig } from '../../types';

const config: BuilderConfig = {
  token: 'test-secret',
  location: 'fsn1',
  server_type: 'cx22',
  image: 'ubuntu-24.04'
};

describe('Resource naming', () => {
  describe('generated names', () => {
    it('should name servers builder-<uuid>', () => {
      const name = generateServerName();

      expect(name).toMatch(/^builder-[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
      expect(isValidServerName(name)).toBe(true);
    });

    it('should name snapshots after the build time in seconds', () => {
      expect(generateSnapshotName(new Date(1700000000500))).toBe('image-1700000000');
    });

    it('should prefer configured names', () => {
      expect(generateBuildNames({ ...config, server_name: 'web', snapshot_name: 'web-image' })).toEqual({
        serverName: 'web',
        snapshotName: 'web-image'
      });
    });

    it('should fill in missing names', () => {
      const resolved = applyNamingDefaults(config, new Date(1700000000000));

      expect(resolved.snapshot_name).toBe('image-1700000000');
      expect(resolved.server_name).toMatch(/^builder-/);
      expect(resolved.location).toBe('fsn1');
    });
  });

  describe('validation helpers', () => {
    it('should accept prefixed label keys', () => {
      expect(isValidLabelKey('example.com/role')).toBe(true);
      expect(isValidLabelKey('role-')).toBe(false);
      expect(isValidLabelKey('a'.repeat(64))).toBe(false);
    });

    it('should accept empty label values but not slashes', () => {
      expect(isValidLabelValue('')).toBe(true);
      expect(isValidLabelValue('v1.2_beta')).toBe(true);
      expect(isValidLabelValue('a/b')).toBe(false);
    });

    it('should accept hostnames as server names', () => {
      expect(isValidServerName('builder-01')).toBe(true);
      expect(isValidServerName('build.example.com')).toBe(true);
      expect(isValidServerName('-builder')).toBe(false);
      expect(isValidServerName('build_01')).toBe(false);
    });
  });
});
