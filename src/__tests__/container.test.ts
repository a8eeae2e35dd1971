import { Container } from '../container';

interface TestServices {
  counter: { value: number };
  label: string;
}

describe('Container', () => {
  let container: Container<TestServices>;

  beforeEach(() => {
    container = new Container<TestServices>();
  });

  it('builds an instance once and caches it', () => {
    const factory = jest.fn(() => ({ value: 1 }));
    container.register('counter', factory);

    const first = container.resolve('counter');
    const second = container.resolve('counter');

    expect(first).toBe(second);
    expect(factory).toHaveBeenCalledTimes(1);
  });

  it('passes itself to factories for dependencies', () => {
    container.register('counter', () => ({ value: 3 }));
    container.register('label', (c) => `count=${c.resolve('counter').value}`);

    expect(container.resolve('label')).toBe('count=3');
  });

  it('throws for an unregistered key', () => {
    expect(() => container.resolve('label')).toThrow('No factory registered for key: label');
    expect(container.has('label')).toBe(false);
  });

  it('prefers an override and rebuilds after clearInstances', () => {
    container.register('label', () => 'built');
    container.override('label', 'mocked');

    expect(container.resolve('label')).toBe('mocked');

    container.clearInstances();
    expect(container.resolve('label')).toBe('built');
  });

  it('keeps instances separate between containers', () => {
    const other = new Container<TestServices>();
    container.register('counter', () => ({ value: 1 }));
    other.register('counter', () => ({ value: 1 }));

    expect(container.resolve('counter')).not.toBe(other.resolve('counter'));
  });
});
