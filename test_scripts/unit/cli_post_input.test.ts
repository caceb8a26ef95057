import { buildProgram, toPostInput, toShareText, toShareVideoInput } from '../../src/cli/douyin';
import { InvalidPostError } from '../../src/douyin/errors';

describe('douyin-poster cli', () => {
  test('--no-music / --debug 옵션을 PostDescriptor 입력으로 옮긴다', () => {
    expect(toPostInput(['a.png'], { title: 't', music: false, debug: true })).toEqual({
      images: ['a.png'],
      title: 't',
      useMusic: false,
      debug: true,
    });
  });

  test('음악 옵션이 없으면 기본으로 켜진다', () => {
    expect(toPostInput(['a.png', 'b.png'], {})).toEqual({
      images: ['a.png', 'b.png'],
      useMusic: true,
      debug: false,
    });
  });

  test('cover/music/post/share 하위 명령을 제공한다', () => {
    const program = buildProgram();
    expect(program.name()).toBe('douyin-poster');
    expect(program.commands.map((c) => c.name())).toEqual(['cover', 'music', 'post', 'share']);
    const post = program.commands.find((c) => c.name() === 'post');
    expect(post?.options.map((o) => o.long)).toEqual([
      '--title',
      '--description',
      '--hotspot',
      '--music',
      '--no-music',
      '--debug',
      '--profileDir',
      '--cdpEndpoint',
    ]);
  });

  test('share 옵션 목록', () => {
    const share = buildProgram().commands.find((c) => c.name() === 'share');
    expect(share?.options.map((o) => o.long)).toEqual([
      '--from-file',
      '--post',
      '--hotspot',
      '--voice',
      '--no-sanitize',
      '--debug',
      '--profileDir',
      '--cdpEndpoint',
    ]);
  });

  test('share 문구는 인자 두 개 또는 파일에서 읽는다', () => {
    expect(toShareText(' 今日热点 ', '今天看到几件事', undefined)).toEqual({ title: '今日热点', content: '今天看到几件事' });

    const read: string[] = [];
    const text = toShareText(undefined, undefined, '/notes/summary.txt', (p) => {
      read.push(p);
      return '科技分享\n有人分享了一个项目';
    });
    expect(read).toEqual(['/notes/summary.txt']);
    expect(text).toEqual({ title: '科技分享', content: '有人分享了一个项目' });
  });

  test('share 문구가 없으면 InvalidPostError', () => {
    expect(() => toShareText('只有标题', undefined, undefined)).toThrow(InvalidPostError);
  });

  test('share 발행 입력은 video 한 개, 설명은 본문 앞 100자', () => {
    const content = '字'.repeat(120);
    expect(toShareVideoInput('/data/p/video.mp4', { title: 't', content }, { hotspot: '效率' })).toEqual({
      mediaType: 'video',
      images: ['/data/p/video.mp4'],
      title: 't',
      description: '字'.repeat(100),
      hotspot: '效率',
      useMusic: false,
      debug: false,
    });
  });
});
