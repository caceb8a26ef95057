import { createPostDescriptor, expandImagePath } from '../../src/douyin/post_descriptor';
import { InvalidPostError } from '../../src/douyin/errors';

const deps = {
  cwd: '/work/posts',
  homeDir: '/home/tester',
  exists: (p: string) => !p.endsWith('missing.png'),
};

describe('post descriptor', () => {
  test('~ 와 상대 경로를 절대 경로로 확장한다', () => {
    expect(expandImagePath('~/pics/a.png', deps)).toBe('/home/tester/pics/a.png');
    expect(expandImagePath('b.png', deps)).toBe('/work/posts/b.png');
    expect(expandImagePath('/abs/c.png', deps)).toBe('/abs/c.png');
  });

  test('기본값은 useMusic=true, debug=false', () => {
    const post = createPostDescriptor({ images: ['a.png'] }, deps);
    expect(post.useMusic).toBe(true);
    expect(post.debug).toBe(false);
    expect(post.images).toEqual(['/work/posts/a.png']);
    expect(post.title).toBeUndefined();
  });

  test('이미지가 없으면 InvalidPostError', () => {
    expect(() => createPostDescriptor({ images: [] }, deps)).toThrow(InvalidPostError);
    expect(() => createPostDescriptor({ images: [] }, deps)).toThrow('[INVALID_POST] images=0');
  });

  test('존재하지 않는 이미지는 경로를 포함해 거부한다', () => {
    expect(() => createPostDescriptor({ images: ['a.png', 'missing.png'] }, deps))
      .toThrow('[INVALID_POST] image_not_found=/work/posts/missing.png');
  });

  test('공백뿐인 热点은 없음으로 처리한다', () => {
    expect(createPostDescriptor({ images: ['a.png'], hotspot: '   ' }, deps).hotspot).toBeUndefined();
    expect(createPostDescriptor({ images: ['a.png'], hotspot: ' 效率 ' }, deps).hotspot).toBe('效率');
  });

  test('생성된 descriptor는 변경할 수 없다', () => {
    const post = createPostDescriptor({ images: ['a.png', 'b.png'], title: 't' }, deps);
    expect(Object.isFrozen(post)).toBe(true);
    expect(Object.isFrozen(post.images)).toBe(true);
  });

  test('기본 mediaType은 image', () => {
    expect(createPostDescriptor({ images: ['a.png'] }, deps).mediaType).toBe('image');
  });

  test('video는 파일 하나만 받고 음악은 항상 끈다', () => {
    const post = createPostDescriptor({ mediaType: 'video', images: ['video.mp4'], useMusic: true }, deps);
    expect(post.mediaType).toBe('video');
    expect(post.images).toEqual(['/work/posts/video.mp4']);
    expect(post.useMusic).toBe(false);
    expect(() => createPostDescriptor({ mediaType: 'video', images: ['a.mp4', 'b.mp4'] }, deps))
      .toThrow('[INVALID_POST] video=2');
  });
});
