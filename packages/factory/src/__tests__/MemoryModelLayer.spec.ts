import { ModelNotFoundError, RelationNotFoundError } from '@forgekit/errors';
import { beforeEach, describe, expect, it } from 'vitest';
import { MemoryModelLayer } from '../MemoryModelLayer';
import { Comment, Post, createModels } from '../../test/models';

describe('MemoryModelLayer', () => {
  let models: MemoryModelLayer;

  beforeEach(() => {
    models = createModels();
  });

  it('should resolve model labels', () => {
    expect(models.resolveModel('posts.Post')).toBe(Post);
    expect(() => models.resolveModel('posts.Like')).toThrow(
      new ModelNotFoundError('posts.Like'),
    );
  });

  it('should build instances without saving them', () => {
    const post = models.build(Post, { title: 'Built' });

    expect(post).toBeInstanceOf(Post);
    expect(post.title).toBe('Built');
    expect(post.id).toBeUndefined();
    expect(models.count(Post)).toBe(0);
  });

  it('should assign incrementing ids per model', async () => {
    const first = await models.save(Post, models.build(Post, {}));
    const second = await models.save(Post, models.build(Post, {}));
    const comment = await models.save(Comment, models.build(Comment, {}));

    expect([first.id, second.id, comment.id]).toEqual([1, 2, 1]);
    expect(models.all(Post)).toEqual([first, second]);
    expect(models.saved).toEqual([first, second, comment]);
  });

  it('should keep explicit ids', async () => {
    const post = await models.save(Post, models.build(Post, { id: 40 }));

    expect(post.id).toBe(40);
  });

  it('should honour a custom primary key', async () => {
    class Slugged {
      key?: number;
      slug = '';
    }
    const layer = new MemoryModelLayer('key').define('posts.Slugged', Slugged);

    const saved = await layer.save(Slugged, layer.build(Slugged, { slug: 'first' }));

    expect(saved.key).toBe(1);
    expect(saved.slug).toBe('first');
    expect(Reflect.has(saved, 'id')).toBe(false);
  });

  it('should describe reverse relations', () => {
    const post = new Post();
    const field = models.relatedField(Post, 'comments');

    expect(field.model).toBe(Comment);
    expect(field.field).toBe('post');
    expect(field.reference(post)).toBe(post);
  });

  it('should reject unknown relations', () => {
    expect(() => models.relatedField(Post, 'likes')).toThrow(
      new RelationNotFoundError('Post', 'likes'),
    );
    expect(() => models.relatedField(Comment, 'post')).toThrow(
      RelationNotFoundError,
    );
  });

  it('should append related objects', () => {
    const post = new Post();
    const first = new Comment();
    const second = new Comment();

    models.attachRelated(post, 'comments', [first]);
    models.attachRelated(post, 'comments', [second]);

    expect(post.comments).toEqual([first, second]);
  });

  it('should forget saved instances on reset', async () => {
    await models.save(Post, models.build(Post, {}));

    models.reset();

    expect(models.count(Post)).toBe(0);
    expect(models.saved).toEqual([]);
    expect(models.resolveModel('posts.Post')).toBe(Post);
  });
});
