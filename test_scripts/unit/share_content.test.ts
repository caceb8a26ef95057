import { parseShareText, sanitizeContent, toShareDescription } from '../../src/utils/share_content';

describe('share content', () => {
  test('다른 플랫폼 이름과 @계정을 지운다', () => {
    expect(sanitizeContent('今天在推特上看到 @elon_musk 的推文，Twitter 和 X.com 都在讨论这条 tweet'))
      .toBe('今天在某平台上看到  的帖子，某平台 和 某平台 都在讨论这条 帖子');
  });

  test('대소문자를 가리지 않는다', () => {
    expect(sanitizeContent('TWITTER / Tweets / x.COM')).toBe('某平台 / 帖子s / 某平台');
  });

  test('첫 줄은 제목, 나머지는 본문', () => {
    expect(parseShareText('\n科技分享\n有人分享了一个项目\n第二段\n')).toEqual({
      title: '科技分享',
      content: '有人分享了一个项目\n第二段',
    });
  });

  test('본문이 없으면 제목을 본문으로 쓴다', () => {
    expect(parseShareText('只有标题')).toEqual({ title: '只有标题', content: '只有标题' });
    expect(parseShareText('标题\n   ')).toEqual({ title: '标题', content: '标题' });
  });

  test('설명은 글자 단위로 자른다', () => {
    expect(toShareDescription('一二三四五', 3)).toBe('一二三');
    expect(toShareDescription('短', 100)).toBe('短');
  });
});
