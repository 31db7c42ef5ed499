import { describe, expect, it, vi } from 'vitest';
import { classify, evaluateDefinition, isFactoryEntry } from '../definition';
import { ref } from '../reference';
import { PostFactory } from '../../test/factories';

describe('classify', () => {
  it('should tag factory instances as nested', () => {
    const factory = new PostFactory();

    expect(classify(factory)).toEqual({ kind: 'nested', factory });
  });

  it('should tag factory classes as references', () => {
    expect(classify(PostFactory)).toEqual({ kind: 'reference', target: PostFactory });
  });

  it('should tag ref() values as references', () => {
    expect(classify(ref('posts.PostFactory'))).toEqual({
      kind: 'reference',
      target: 'posts.PostFactory',
    });
  });

  it('should treat plain strings as literals', () => {
    expect(classify('posts.PostFactory')).toEqual({
      kind: 'scalar',
      value: 'posts.PostFactory',
    });
  });

  it('should tag callables as lazy', () => {
    const produce = () => 'value';

    expect(classify(produce)).toEqual({ kind: 'lazy', produce });
  });

  it('should keep other values as scalars', () => {
    const date = new Date(0);

    expect(classify(3)).toEqual({ kind: 'scalar', value: 3 });
    expect(classify(null)).toEqual({ kind: 'scalar', value: null });
    expect(classify(date)).toEqual({ kind: 'scalar', value: date });
    expect(classify({ a: 1 })).toEqual({ kind: 'scalar', value: { a: 1 } });
  });
});

describe('isFactoryEntry', () => {
  it('should accept nested and reference entries only', () => {
    expect(isFactoryEntry(classify(new PostFactory()))).toBe(true);
    expect(isFactoryEntry(classify(PostFactory))).toBe(true);
    expect(isFactoryEntry(classify(() => 1))).toBe(false);
    expect(isFactoryEntry(classify('x'))).toBe(false);
  });
});

describe('evaluateDefinition', () => {
  it('should keep declaration order', () => {
    const fields = evaluateDefinition(new PostFactory());

    expect(fields.map((field) => field.name)).toEqual([
      'title',
      'content',
      'metadata',
      'author',
    ]);
    expect(fields[3]?.entry.kind).toBe('nested');
  });

  it('should call definition() exactly once', () => {
    const definition = vi.fn(() => ({ title: 'Once', count: 1 }));

    const fields = evaluateDefinition({ definition });

    expect(definition).toHaveBeenCalledTimes(1);
    expect(fields).toEqual([
      { name: 'title', entry: { kind: 'scalar', value: 'Once' } },
      { name: 'count', entry: { kind: 'scalar', value: 1 } },
    ]);
  });

  it('should not call lazy values', () => {
    const produce = vi.fn(() => 'late');

    evaluateDefinition({ definition: () => ({ value: produce }) });

    expect(produce).not.toHaveBeenCalled();
  });
});
