import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Browser, chromium, Page } from 'playwright';
import type { StepTiming } from '../../src/common/config';
import { PlaywrightPageDriver, resolveDescriptor } from '../../src/douyin/driver';
import { UploadError } from '../../src/douyin/errors';
import { clickSubmit, selectMusic, uploadImages } from '../../src/douyin/publish_steps';
import { DOUYIN_SELECTORS as S } from '../../src/douyin/selectors';

// 브라우저가 설치되지 않은 환경에서는 건너뛴다
function chromiumInstalled(): boolean {
  try {
    return fs.existsSync(chromium.executablePath());
  } catch {
    return false;
  }
}

const describeWithBrowser = chromiumInstalled() ? describe : describe.skip;

const TIMING: StepTiming = { timeoutMs: 3_000, settleMs: 0 };

const uploadHtml = `
  <html>
    <body>
      <div id="upload" style="width:200px; height:40px">点击上传</div>
      <input id="file" type="file" multiple style="display:none">
      <script>
        const input = document.getElementById('file');
        document.getElementById('upload').addEventListener('click', () => input.click());
        input.addEventListener('change', () => {
          document.body.dataset.files = Array.from(input.files).map((f) => f.name).join(',');
        });
      </script>
    </body>
  </html>
`;

const deadUploadHtml = `
  <html>
    <body>
      <div style="width:200px; height:40px">点击上传</div>
    </body>
  </html>
`;

const submitHtml = `
  <html>
    <body>
      <button id="hd">高清发布</button>
      <button id="publish">发布</button>
      <script>
        for (const button of document.querySelectorAll('button')) {
          button.addEventListener('click', () => { document.body.dataset.submitted = button.id; });
        }
      </script>
    </body>
  </html>
`;

const musicHtml = `
  <html>
    <body>
      <div id="open" style="width:120px; height:30px">选择音乐</div>
      <div id="panel" class="semi-sidesheet" style="display:none; position:fixed; top:0; right:0; width:360px; height:100%; z-index:2; background:#fff">
        <div class="row" data-track="晴天" style="height:40px"><span class="use-label">使用</span></div>
        <div class="row" data-track="夜曲" style="height:40px"><span class="use-label">使用</span></div>
        <div class="semi-sidesheet-close" id="close" style="width:20px; height:20px">×</div>
      </div>
      <div id="mask" class="semi-sidesheet-mask" style="display:none; position:fixed; inset:0; z-index:1; background:rgba(0,0,0,0.2)"></div>
      <script>
        const panel = document.getElementById('panel');
        const mask = document.getElementById('mask');
        document.getElementById('open').addEventListener('click', () => {
          panel.style.display = 'block';
          mask.style.display = 'block';
        });
        document.getElementById('close').addEventListener('click', () => {
          panel.style.display = 'none';
          mask.style.display = 'none';
        });
        for (const row of document.querySelectorAll('.row')) {
          row.querySelector('.use-label').addEventListener('mouseover', () => {
            if (row.querySelector('button')) return;
            const button = document.createElement('button');
            button.className = 'semi-button semi-button-primary';
            button.textContent = '使用';
            button.addEventListener('click', () => { document.body.dataset.music = row.dataset.track; });
            row.appendChild(button);
          });
        }
      </script>
    </body>
  </html>
`;

describeWithBrowser('PlaywrightPageDriver (headless fixture)', () => {
  let browser: Browser;
  let page: Page;
  let workDir: string;

  beforeAll(async () => {
    browser = await chromium.launch({ headless: true });
    workDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'douyin-driver-'));
  }, 30_000);

  afterAll(async () => {
    await browser.close();
    await fs.promises.rm(workDir, { recursive: true, force: true });
  });

  beforeEach(async () => {
    page = await browser.newPage();
  });

  afterEach(async () => {
    await page.close();
  });

  test('업로드 컨트롤이 연 chooser에 이미지 두 장을 순서대로 넣는다', async () => {
    const first = path.join(workDir, 'a.png');
    const second = path.join(workDir, 'b.png');
    await fs.promises.writeFile(first, 'a');
    await fs.promises.writeFile(second, 'b');
    await page.setContent(uploadHtml);

    await uploadImages(new PlaywrightPageDriver(page), [first, second], TIMING);

    expect(await page.locator('body').getAttribute('data-files')).toBe('a.png,b.png');
  });

  test('chooser가 열리지 않으면 UploadError', async () => {
    const file = path.join(workDir, 'c.png');
    await fs.promises.writeFile(file, 'c');
    await page.setContent(deadUploadHtml);

    const attempt = uploadImages(new PlaywrightPageDriver(page), [file], { timeoutMs: 1_000, settleMs: 0 });

    await expect(attempt).rejects.toBeInstanceOf(UploadError);
    await expect(attempt).rejects.toThrow(
      '[UPLOAD_ERROR] step=IMAGES_UPLOADED file chooser not opened within 1000ms after clicking text*="点击上传"',
    );
  });

  test('발행 버튼 descriptor는 高清发布를 제외한 하나만 찾는다', async () => {
    await page.setContent(submitHtml);

    expect(await resolveDescriptor(page, S.submitButton).count()).toBe(1);
    expect(await clickSubmit(new PlaywrightPageDriver(page), TIMING)).toBe('发布');
    expect(await page.locator('body').getAttribute('data-submitted')).toBe('publish');
  });

  test('hover로 드러난 使用 버튼으로 첫 트랙을 고르고 패널을 닫는다', async () => {
    await page.setContent(musicHtml);

    const result = await selectMusic(new PlaywrightPageDriver(page), TIMING);

    expect(result).toEqual({ trackIndex: 0 });
    expect(await page.locator('body').getAttribute('data-music')).toBe('晴天');
    expect(await page.locator('#panel').isVisible()).toBe(false);
    expect(await page.locator('#mask').isVisible()).toBe(false);
  });
});
