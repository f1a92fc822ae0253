import { loadAppConfig } from '../config/app.config';
import { DataProtectionService } from './data-protection.service';

describe('DataProtectionService', () => {
  const build = (key: string) =>
    new DataProtectionService(loadAppConfig({ DATA_ENCRYPTION_KEY: key }));

  it('round-trips text through encrypt and decrypt', () => {
    const service = build('test-secret');
    const text = 'Update client balance for cli001 to 5000 ✓';

    const encrypted = service.encrypt(text);

    expect(encrypted).not.toContain('cli001');
    expect(service.decrypt(encrypted)).toBe(text);
  });

  it('uses a fresh IV for every call', () => {
    const service = build('test-secret');

    expect(service.encrypt('same')).not.toBe(service.encrypt('same'));
  });

  it('fails to decrypt with a different key', () => {
    const encrypted = build('test-secret').encrypt('payload');

    expect(() => build('another-secret').decrypt(encrypted)).toThrow();
  });
});
