import { ensureAuthenticated, isSamePage } from '../../src/douyin/login_gate';
import { NotLoggedInError } from '../../src/douyin/errors';
import { FixturePage } from '../support/fixture_page';

describe('login gate', () => {
  test('이미 로그인되어 있으면 첫 확인에서 통과하고 안내를 띄우지 않는다', async () => {
    const page = new FixturePage();
    const result = await ensureAuthenticated(page, { timeoutMs: 100, pollIntervalMs: 5 });

    expect(result.polls).toBe(1);
    expect(result.prompted).toBe(false);
    expect(page.pauses).toEqual([]);
  });

  test('수동 로그인이 끝날 때까지 poll 간격으로 기다린다', async () => {
    const page = new FixturePage({ loginAfterChecks: 2 });
    const result = await ensureAuthenticated(page, { timeoutMs: 1_000, pollIntervalMs: 5 });

    expect(result.polls).toBe(3);
    expect(result.prompted).toBe(true);
    expect(page.pauses).toEqual([5, 5]);
    expect(page.actions).toEqual([]);
  });

  test('시간 안에 로그인하지 않으면 NotLoggedInError', async () => {
    const page = new FixturePage({ loginAfterChecks: Number.POSITIVE_INFINITY });
    const attempt = ensureAuthenticated(page, { timeoutMs: 25, pollIntervalMs: 5 });

    await expect(attempt).rejects.toBeInstanceOf(NotLoggedInError);
    await expect(attempt).rejects.toThrow('[NOT_LOGGED_IN] waitedFor=[placeholder="添加作品标题"] timeoutMs=25');
    expect(page.actions).toEqual([]);
  });

  const POST_URL = 'https://creator.example.test/creator-micro/content/post/image?type=new';
  const HOME_URL = 'https://creator.example.test/creator-micro/home';

  test('로그인 후 다른 페이지로 이동되면 returnUrl로 다시 이동한다', async () => {
    const page = new FixturePage({ loginAfterChecks: 1, loginRedirectUrl: HOME_URL });
    await page.goto(POST_URL);

    const result = await ensureAuthenticated(page, { timeoutMs: 1_000, pollIntervalMs: 5, returnUrl: POST_URL });

    expect(result.renavigations).toBe(1);
    expect(result.polls).toBe(3);
    expect(page.pauses).toEqual([5]);
    expect(page.actions).toEqual([
      { type: 'goto', key: 'page', value: POST_URL },
      { type: 'goto', key: 'page', value: POST_URL },
    ]);
  });

  test('URL이 그대로인 로그인 화면에서는 다시 이동하지 않는다', async () => {
    const page = new FixturePage({ loginAfterChecks: Number.POSITIVE_INFINITY, loginRedirectUrl: HOME_URL });
    await page.goto(HOME_URL);

    await expect(ensureAuthenticated(page, { timeoutMs: 25, pollIntervalMs: 5, returnUrl: POST_URL }))
      .rejects.toBeInstanceOf(NotLoggedInError);
    expect(page.actions).toEqual([{ type: 'goto', key: 'page', value: HOME_URL }]);
  });

  test('origin과 path가 같으면 query가 달라도 같은 페이지다', () => {
    expect(isSamePage(`${POST_URL}&from=login`, POST_URL)).toBe(true);
    expect(isSamePage(HOME_URL, POST_URL)).toBe(false);
    expect(isSamePage('', POST_URL)).toBe(false);
  });
});
