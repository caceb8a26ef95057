import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

// 테스트 로그가 작업 디렉토리의 logs/ 에 쌓이지 않도록 임시 디렉토리로 돌린다
if (!process.env.DOUYIN_LOG_DIR) {
  process.env.DOUYIN_LOG_DIR = fs.mkdtempSync(path.join(os.tmpdir(), 'douyin-test-logs-'));
}
delete process.env.ARTIFACTS_DIR;
delete process.env.DOUYIN_RUN_ID;
