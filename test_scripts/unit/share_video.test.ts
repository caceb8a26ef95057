import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { buildShareVideo, type ShareVideoDeps } from '../../src/media/share_video';

type Call = { step: string; args: string[] };

function recordingDeps(calls: Call[]): ShareVideoDeps {
  return {
    renderCover: async (text, outputPath) => {
      calls.push({ step: 'cover', args: [text, outputPath] });
      return outputPath;
    },
    synthesizeSpeech: (text, voice, outputPath) => {
      calls.push({ step: 'tts', args: [text, voice, outputPath] });
      return outputPath;
    },
    composeVideo: (imagePath, audioPath, outputPath) => {
      calls.push({ step: 'video', args: [imagePath, audioPath, outputPath] });
      return outputPath;
    },
  };
}

describe('share video', () => {
  const now = new Date(2026, 6, 4, 9, 30, 15);

  test('한 게시물 폴더에 표지, 음성, 영상을 순서대로 만든다', async () => {
    const dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'douyin-share-'));
    const calls: Call[] = [];

    const artifacts = await buildShareVideo({
      title: '推特趣闻',
      content: '今天在推特上看到三件事',
      dataDir,
      voice: 'zh-CN-YunxiNeural',
      sanitize: true,
      now,
    }, recordingDeps(calls));

    const dir = path.join(dataDir, '20260704_093015_某平台趣闻');
    expect(artifacts).toEqual({
      title: '某平台趣闻',
      content: '今天在某平台上看到三件事',
      dir,
      coverPath: path.join(dir, 'cover.png'),
      audioPath: path.join(dir, 'audio.mp3'),
      videoPath: path.join(dir, 'video.mp4'),
    });
    expect(calls).toEqual([
      { step: 'cover', args: ['某平台趣闻', path.join(dir, 'cover.png')] },
      { step: 'tts', args: ['今天在某平台上看到三件事', 'zh-CN-YunxiNeural', path.join(dir, 'audio.mp3')] },
      { step: 'video', args: [path.join(dir, 'cover.png'), path.join(dir, 'audio.mp3'), path.join(dir, 'video.mp4')] },
    ]);
    expect(JSON.parse(fs.readFileSync(path.join(dir, 'post.json'), 'utf-8'))).toEqual({
      title: '某平台趣闻',
      body: '今天在某平台上看到三件事',
      cover: 'cover.png',
    });
  });

  test('sanitize=false면 원문 그대로 쓴다', async () => {
    const dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'douyin-share-'));
    const calls: Call[] = [];

    const artifacts = await buildShareVideo({
      title: '推特趣闻',
      content: '@someone 说',
      dataDir,
      voice: 'v',
      sanitize: false,
      now,
    }, recordingDeps(calls));

    expect(artifacts.title).toBe('推特趣闻');
    expect(calls[1]?.args[0]).toBe('@someone 说');
  });

  test('음성 생성이 실패하면 영상은 만들지 않는다', async () => {
    const dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'douyin-share-'));
    const calls: Call[] = [];
    const deps: ShareVideoDeps = {
      ...recordingDeps(calls),
      synthesizeSpeech: () => { throw new Error('[TTS_FAILED] status=1 stderr=x'); },
    };

    await expect(buildShareVideo({ title: 't', content: 'c', dataDir, voice: 'v', sanitize: true, now }, deps))
      .rejects.toThrow('[TTS_FAILED]');
    expect(calls.map((c) => c.step)).toEqual(['cover']);
  });
});
