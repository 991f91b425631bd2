import { MemoryTarget } from '../testing/memory-target';
import { createTarget, registerTarget } from './target-registry';

describe('target registry', () => {
  it('creates the registered target for a config type', () => {
    const target = new MemoryTarget();
    registerTarget('custom', () => target);

    expect(createTarget({ type: 'custom' })).toBe(target);
  });

  it('names the available types when the config type is unknown', () => {
    registerTarget('custom', () => new MemoryTarget());

    expect(() => createTarget({ type: 'postgresql', host: 'h', port: 5432, user: 'u', password: 'test-secret', database: 'd', ssl: false })).toThrow(
      /^Unknown target type "postgresql"\. Available: .*custom/
    );
  });
});
