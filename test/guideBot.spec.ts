import { GuideBot, importDocumentName, type BotMessage } from '../src/services/guide/guideBot';
import { GuideService } from '../src/services/guide/guideService';
import { DOCUMENT_TEMPLATE, formatImportStart, formatImportSuccess, HELP_TEXT } from '../src/services/guide/prompts';
import { Searcher } from '../src/services/guide/searcher';
import { FakeChatCompleter, MemoryKnowledgeStore } from './testStore';

const BURN_GUIDE = '燃烧队核心是叠加燃烧层数。';

describe('GuideBot', () => {
  let store: MemoryKnowledgeStore;
  let service: GuideService;
  let bot: GuideBot;
  let now: Date;

  const admin = (text: string): BotMessage => ({ origin: 'group:g1', groupId: 'g1', isAdmin: true, text, mentioned: false });
  const member = (text: string, mentioned = false): BotMessage => ({
    origin: 'group:g1',
    groupId: 'g1',
    isAdmin: false,
    text,
    mentioned,
  });

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    store = new MemoryKnowledgeStore();
    service = new GuideService({ store, createSearcher: () => new Searcher(), llm: new FakeChatCompleter() });
    now = new Date(2024, 0, 2, 3, 4, 5);
    bot = new GuideBot(service, { importTimeoutSeconds: 60, now: () => now });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('help, template and unknown subcommands', async () => {
    expect(await bot.handle(member('/guide'))).toBe(HELP_TEXT);
    expect(await bot.handle(member('/guide help'))).toBe(HELP_TEXT);
    expect(await bot.handle(member('/guide template'))).toBe(DOCUMENT_TEMPLATE);
    expect(await bot.handle(member('/guide foo'))).toBe('未知子命令: foo\n使用 /guide help 查看帮助');
  });

  test('import and clear are admin only', async () => {
    expect(await bot.handle(member('/guide import'))).toBe('❌ 仅管理员可以导入攻略文档');
    expect(await bot.handle(member('/guide clear'))).toBe('❌ 仅管理员可以清空知识库');
  });

  test('import session collects messages into one group document', async () => {
    expect(await bot.handle(admin('/guide import'))).toBe(formatImportStart(60));
    expect(await bot.handle(admin('燃烧队核心是'))).toBeNull();
    expect(await bot.handle(admin('叠加燃烧层数。'))).toBeNull();

    const reply = await bot.handle(admin('/done'));
    expect(reply).toBe(
      formatImportSuccess({
        docName: 'guide_20240102_030405',
        charCount: 15,
        chunkCount: 1,
        topTags: [['状态:Burn', 1]],
      })
    );
    expect(store.documents.map((doc) => [doc.name, doc.scope, doc.rawText])).toEqual([
      ['guide_20240102_030405', 'group', '燃烧队核心是\n\n叠加燃烧层数。'],
    ]);
  });

  test('/done without texts and without a session', async () => {
    await bot.handle(admin('/guide import'));
    expect(await bot.handle(admin('/done'))).toBe('❌ 没有收到任何文本内容，导入已取消');
    expect(await bot.handle(admin('/done'))).toBe('当前没有进行中的导入会话');
  });

  test('session expires after the timeout', async () => {
    await bot.handle(admin('/guide import'));
    now = new Date(now.getTime() + 61_000);
    expect(await bot.handle(admin(BURN_GUIDE))).toBe('⏰ 导入会话已超时，请重新开始');
    expect(await bot.handle(admin('/done'))).toBe('当前没有进行中的导入会话');
  });

  test('/cancel drops the session', async () => {
    await bot.handle(admin('/guide import'));
    expect(await bot.handle(admin('/cancel'))).toBe('✅ 导入已取消');
    expect(await bot.handle(admin('/cancel'))).toBe('当前没有进行中的导入会话');
  });

  test('other commands during a session are ignored, not collected', async () => {
    await bot.handle(admin('/guide import'));
    expect(await bot.handle(admin('/other'))).toBeNull();
    expect(await bot.handle(admin('/done'))).toBe('❌ 没有收到任何文本内容，导入已取消');
  });

  test('/guide clear removes the group library only', async () => {
    await service.ingestDocument({ name: 'global', rawText: BURN_GUIDE, visibility: { scope: 'global' } });
    await service.ingestDocument({ name: 'own', rawText: '流血', visibility: { scope: 'group', groupId: 'g1' } });

    expect(await bot.handle(admin('/guide clear'))).toBe('✅ 已清空群 g1 的覆盖知识库');
    expect(store.documents.map((doc) => doc.name)).toEqual(['global']);
  });

  test('/guide mode shows and sets the default mode', async () => {
    expect(await bot.handle(member('/guide mode'))).toBe('当前默认回答模式：simple');
    expect(await bot.handle(member('/guide mode DETAIL'))).toBe('✅ 已将默认回答模式设置为：detail');
    expect(await bot.handle(member('/guide mode'))).toBe('当前默认回答模式：detail');
    expect(await bot.handle(member('/guide mode long'))).toBe('❌ 模式只能是 simple 或 detail');
  });

  test('/guide status reports the group', async () => {
    const reply = await bot.handle(member('/guide status'));
    expect(reply?.split('\n')[2]).toBe('群号：g1');
  });

  test('questions are answered only when mentioned', async () => {
    expect(await bot.handle(member('燃烧队怎么配'))).toBeNull();
    expect(await bot.handle(member('燃烧队怎么配', true))).toBe(
      '📚 知识库为空\n\n请先使用 /guide import 导入攻略文档\n可用 /guide template 获取文档模板'
    );

    await service.ingestDocument({ name: 'burn', rawText: BURN_GUIDE, visibility: { scope: 'global' } });
    expect(await bot.handle(member('燃烧队怎么配', true))).toBe('test answer');
    expect((await bot.handle(member('xyz', true)))?.startsWith('🔍 未找到相关内容')).toBe(true);
  });

  test('mentions that look like guide commands are not questions', async () => {
    await service.ingestDocument({ name: 'burn', rawText: BURN_GUIDE, visibility: { scope: 'global' } });
    expect(await bot.handle(member('/guidebook 燃烧', true))).toBeNull();
    expect(await bot.handle(member('guide 燃烧', true))).toBeNull();
    expect(await bot.handle(member('/roll 燃烧队怎么配', true))).toBe('test answer');
  });

  test('private messages use the private pseudo group', async () => {
    const reply = await bot.handle({ origin: 'user:1', isAdmin: false, text: '/guide status', mentioned: true });
    expect(reply?.split('\n')[2]).toBe('群号：private');
  });
});

describe('importDocumentName', () => {
  test('local date and time', () => {
    expect(importDocumentName(new Date(2024, 10, 30, 23, 59, 1))).toBe('guide_20241130_235901');
  });
});
