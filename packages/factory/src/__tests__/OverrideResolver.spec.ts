import { UnknownFieldError } from '@forgekit/errors';
import { describe, expect, it } from 'vitest';
import type { DefinitionField } from '../definition';
import { partitionOverrides, resolveOverrides } from '../OverrideResolver';
import { PostFactory } from '../../test/factories';
import { Post } from '../../test/models';

describe('partitionOverrides', () => {
  it('should group dotted keys by their first segment', () => {
    const { direct, nested } = partitionOverrides({
      content: 'Hi',
      post__title: 'A',
      post__author__name: 'B',
    });

    expect(direct).toEqual({ content: 'Hi' });
    expect(nested).toEqual(
      new Map([['post', { title: 'A', author__name: 'B' }]]),
    );
  });

  it('should drop undefined values', () => {
    const { direct, nested } = partitionOverrides({
      content: undefined,
      post__title: undefined,
    });

    expect(direct).toEqual({});
    expect(nested.size).toBe(0);
  });

  it('should treat keys without a field or a remainder as direct', () => {
    const { direct, nested } = partitionOverrides({ __meta: 1, post__: 2 });

    expect(direct).toEqual({ __meta: 1, post__: 2 });
    expect(nested.size).toBe(0);
  });
});

describe('resolveOverrides', () => {
  const post = new PostFactory();
  const fields: DefinitionField[] = [
    { name: 'content', entry: { kind: 'scalar', value: 'Original' } },
    { name: 'post', entry: { kind: 'nested', factory: post } },
  ];

  it('should keep the definition when there are no overrides', () => {
    expect(resolveOverrides('CommentFactory', fields)).toEqual(fields);
  });

  it('should replace scalar fields', () => {
    const [content] = resolveOverrides('CommentFactory', fields, {
      content: 'Changed',
    });

    expect(content).toEqual({
      name: 'content',
      entry: { kind: 'scalar', value: 'Changed' },
    });
  });

  it('should carry dotted overrides to the nested factory', () => {
    const [, field] = resolveOverrides('CommentFactory', fields, {
      post__title: 'Nested',
      post__author__name: 'Ada',
    });

    expect(field).toEqual({
      name: 'post',
      entry: { kind: 'nested', factory: post },
      overrides: { title: 'Nested', author__name: 'Ada' },
    });
  });

  it('should merge a flat sub-mapping with dotted keys, dotted keys winning', () => {
    const [, field] = resolveOverrides('CommentFactory', fields, {
      post: { title: 'Flat', content: 'Flat content' },
      post__title: 'Dotted',
    });

    expect(field?.overrides).toEqual({ title: 'Dotted', content: 'Flat content' });
    expect(field?.entry).toEqual({ kind: 'nested', factory: post });
  });

  it('should let a direct instance win over dotted keys', () => {
    const instance = new Post();

    const [, field] = resolveOverrides('CommentFactory', fields, {
      post: instance,
      post__title: 'Ignored',
    });

    expect(field).toEqual({
      name: 'post',
      entry: { kind: 'scalar', value: instance },
    });
  });

  it('should apply dotted keys to a replacement factory', () => {
    const replacement = new PostFactory();

    const [, field] = resolveOverrides('CommentFactory', fields, {
      post: replacement,
      post__title: 'Replaced',
    });

    expect(field).toEqual({
      name: 'post',
      entry: { kind: 'nested', factory: replacement },
      overrides: { title: 'Replaced' },
    });
  });

  it('should reject every unknown field at once', () => {
    expect(() =>
      resolveOverrides('CommentFactory', fields, {
        contnet: 'x',
        author__name: 'y',
        author__email: 'z',
      }),
    ).toThrow(
      new UnknownFieldError('CommentFactory', ['contnet', 'author'], ['content', 'post']),
    );
  });

  it('should report the unknown fields', () => {
    let caught: unknown;
    try {
      resolveOverrides('CommentFactory', fields, { contnet: 'x' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(UnknownFieldError);
    expect(caught).toMatchObject({
      factory: 'CommentFactory',
      fields: ['contnet'],
      knownFields: ['content', 'post'],
      message: 'CommentFactory has no field(s) "contnet". Known fields: content, post',
    });
  });

  it('should force values over overrides', () => {
    const parent = new Post();

    const [, field] = resolveOverrides(
      'CommentFactory',
      fields,
      { post: new Post(), post__title: 'Ignored' },
      { post: parent },
    );

    expect(field).toEqual({
      name: 'post',
      entry: { kind: 'scalar', value: parent },
    });
  });

  it('should accept overrides of forced values the definition lacks', () => {
    const merged = resolveOverrides(
      'CommentFactory',
      fields,
      { post_id: 9 },
      { post_id: 4 },
    );

    expect(merged.map((field) => field.name)).toEqual(['content', 'post', 'post_id']);
    expect(merged[2]).toEqual({
      name: 'post_id',
      entry: { kind: 'scalar', value: 4 },
    });
  });

  it('should carry a mapping given for a callable as its replacement', () => {
    const produce = () => ({ status: 'draft' });
    const lazyFields: DefinitionField[] = [
      { name: 'metadata', entry: { kind: 'lazy', produce } },
    ];

    const [field] = resolveOverrides('PostFactory', lazyFields, {
      metadata: { views: 3 },
    });

    expect(field).toEqual({
      name: 'metadata',
      entry: { kind: 'lazy', produce },
      overrides: { views: 3 },
      replacement: { views: 3 },
    });
  });

  it('should append forced values the definition lacks', () => {
    const merged = resolveOverrides('CommentFactory', fields, {}, { post_id: 4 });

    expect(merged.map((field) => field.name)).toEqual(['content', 'post', 'post_id']);
    expect(merged[2]).toEqual({
      name: 'post_id',
      entry: { kind: 'scalar', value: 4 },
    });
  });
});
