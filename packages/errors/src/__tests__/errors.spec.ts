import { describe, expect, it } from 'vitest';
import {
  FactoryError,
  FactoryErrorCode,
  FactoryNotFoundError,
  InvalidBatchError,
  InvalidIdentifierError,
  isFactoryError,
  ModelLayerNotConfiguredError,
  ModelNotFoundError,
  RegistrySealedError,
  RelationNotFoundError,
  UnknownFieldError,
  wrapError,
} from '../index';

describe('FactoryError', () => {
  it('should create a basic factory error', () => {
    const error = new FactoryError(FactoryErrorCode.UNKNOWN, 'Broken');

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(FactoryError);
    expect(error.code).toBe('UNKNOWN');
    expect(error.message).toBe('Broken');
    expect(error.name).toBe('FactoryError');
    expect(error.isFactoryError).toBe(true);
    expect(error.details).toBeUndefined();
  });

  it('should keep the cause', () => {
    const cause = new Error('root');
    const error = new FactoryError(FactoryErrorCode.UNKNOWN, 'Broken', {
      cause,
    });

    expect(error.cause).toBe(cause);
  });

  it('should serialize to JSON', () => {
    const error = new FactoryError(FactoryErrorCode.UNKNOWN, 'Broken', {
      details: { factory: 'PostFactory' },
    });

    const json = error.toJSON();

    expect(json.name).toBe('FactoryError');
    expect(json.code).toBe('UNKNOWN');
    expect(json.message).toBe('Broken');
    expect(json.details).toEqual({ factory: 'PostFactory' });
    expect(json.stack).toBeDefined();
  });
});

describe('specific errors', () => {
  it('should list unknown and known fields', () => {
    const error = new UnknownFieldError(
      'PostFactory',
      ['titel', 'body'],
      ['title', 'content'],
    );

    expect(error.name).toBe('UnknownFieldError');
    expect(error.code).toBe(FactoryErrorCode.UNKNOWN_FIELD);
    expect(error.message).toBe(
      'PostFactory has no field(s) "titel", "body". Known fields: title, content',
    );
    expect(error.fields).toEqual(['titel', 'body']);
    expect(error.details).toEqual({
      factory: 'PostFactory',
      fields: ['titel', 'body'],
      knownFields: ['title', 'content'],
    });
  });

  it('should mention when a factory has no fields at all', () => {
    const error = new UnknownFieldError('EmptyFactory', ['x'], []);

    expect(error.message).toBe(
      'EmptyFactory has no field(s) "x". Known fields: (none)',
    );
  });

  it('should describe a missing factory', () => {
    const error = new FactoryNotFoundError('posts.MissingFactory');

    expect(error.code).toBe(FactoryErrorCode.FACTORY_NOT_FOUND);
    expect(error.identifier).toBe('posts.MissingFactory');
    expect(error.message).toContain('"posts.MissingFactory" is not registered');
  });

  it('should describe a missing relation', () => {
    const error = new RelationNotFoundError('Post', 'likes');

    expect(error.code).toBe(FactoryErrorCode.RELATION_NOT_FOUND);
    expect(error.message).toBe('"likes" is not a reverse relation of Post');
    expect(error.details).toEqual({ model: 'Post', relation: 'likes' });
  });

  it('should describe a missing model', () => {
    const error = new ModelNotFoundError('posts.Missing');

    expect(error.code).toBe(FactoryErrorCode.MODEL_NOT_FOUND);
    expect(error.message).toBe(
      'Model "posts.Missing" is not known to the model layer',
    );
  });

  it('should describe a missing model layer', () => {
    const error = new ModelLayerNotConfiguredError('PostFactory');

    expect(error.code).toBe(FactoryErrorCode.MODEL_LAYER_NOT_CONFIGURED);
    expect(error.message).toContain('configureFactories({ models })');
  });

  it('should describe invalid identifiers and sealed registries', () => {
    expect(new InvalidIdentifierError('PostFactory').message).toBe(
      '"PostFactory" is not a valid identifier, expected "<app>.<Name>"',
    );
    expect(new RegistrySealedError('posts.PostFactory').code).toBe(
      FactoryErrorCode.REGISTRY_SEALED,
    );
  });

  it('should carry batch details', () => {
    const error = new InvalidBatchError('Batch size must be a non-negative integer', {
      size: -1,
    });

    expect(error.code).toBe(FactoryErrorCode.INVALID_BATCH);
    expect(error.details).toEqual({ size: -1 });
  });
});

describe('isFactoryError', () => {
  it('should recognise factory errors', () => {
    expect(isFactoryError(new FactoryNotFoundError('a.B'))).toBe(true);
  });

  it('should recognise duck-typed factory errors', () => {
    expect(isFactoryError({ isFactoryError: true })).toBe(true);
  });

  it('should reject other values', () => {
    expect(isFactoryError(new Error('plain'))).toBe(false);
    expect(isFactoryError(null)).toBe(false);
    expect(isFactoryError('error')).toBe(false);
    expect(isFactoryError({ isFactoryError: 'yes' })).toBe(false);
  });
});

describe('wrapError', () => {
  it('should return factory errors unchanged', () => {
    const error = new ModelNotFoundError('posts.Post');

    expect(wrapError(error)).toBe(error);
  });

  it('should wrap plain errors', () => {
    const original = new Error('disk full');
    const wrapped = wrapError(original);

    expect(wrapped).toBeInstanceOf(FactoryError);
    expect(wrapped.code).toBe(FactoryErrorCode.UNKNOWN);
    expect(wrapped.message).toBe('disk full');
    expect(wrapped.cause).toBe(original);
  });

  it('should use the provided message', () => {
    const wrapped = wrapError('boom', 'Seeding failed');

    expect(wrapped.message).toBe('Seeding failed');
    expect(wrapped.details).toEqual({ originalError: 'boom' });
  });
});
