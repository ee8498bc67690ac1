import { getErrorStatus } from '../llm/llmClient';
import type { GuideService } from './guideService';
import { ImportSessionManager } from './importSessions';
import {
  DOCUMENT_TEMPLATE,
  formatImportStart,
  formatImportSuccess,
  formatStatus,
  HELP_TEXT,
  isAnswerMode,
} from './prompts';

export interface BotMessage {
  /** Stable id of the conversation the message came from; import sessions are keyed by it. */
  origin: string;
  groupId?: string;
  isAdmin: boolean;
  text: string;
  /** The bot was @-mentioned or woken explicitly. */
  mentioned: boolean;
}

export interface GuideBotOptions {
  importTimeoutSeconds?: number;
  now?: () => Date;
}

const PRIVATE_GROUP_ID = 'private';
const TOP_TAG_COUNT = 5;

const EMPTY_KNOWLEDGE_BASE_TEXT = [
  '📚 知识库为空',
  '',
  '请先使用 /guide import 导入攻略文档',
  '可用 /guide template 获取文档模板',
].join('\n');

const NO_RESULTS_TEXT = [
  '🔍 未找到相关内容',
  '',
  '请尝试：',
  '1. 换一种问法',
  '2. 确认知识库中包含相关内容',
  '3. 使用 /guide status 查看知识库状态',
].join('\n');

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function importDocumentName(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `guide_${day}_${time}`;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Chat-command front end for the guide service. Returns the reply text for a
 * message, or null when the bot should stay silent.
 */
export class GuideBot {
  readonly sessions: ImportSessionManager;
  private readonly importTimeoutSeconds: number;
  private readonly now: () => Date;

  constructor(
    private readonly service: GuideService,
    options: GuideBotOptions = {}
  ) {
    this.importTimeoutSeconds = options.importTimeoutSeconds ?? 60;
    this.now = options.now ?? (() => new Date());
    this.sessions = new ImportSessionManager(this.importTimeoutSeconds * 1000, () => this.now().getTime());
  }

  async handle(message: BotMessage): Promise<string | null> {
    const text = message.text.trim();
    const groupId = message.groupId ?? PRIVATE_GROUP_ID;

    if (text === '/guide' || text.startsWith('/guide ')) {
      return this.handleGuideCommand(message, groupId, text);
    }
    if (text === '/done') {
      return this.finishImport(message.origin);
    }
    if (text === '/cancel') {
      return this.sessions.cancel(message.origin) ? '✅ 导入已取消' : '当前没有进行中的导入会话';
    }

    if (this.sessions.has(message.origin)) {
      if (text.startsWith('/')) {
        return null;
      }
      const outcome = this.sessions.append(message.origin, text);
      return outcome === 'expired' ? '⏰ 导入会话已超时，请重新开始' : null;
    }

    if (message.mentioned && !text.startsWith('/guide') && !text.startsWith('guide')) {
      return this.answer(groupId, text);
    }
    return null;
  }

  private async handleGuideCommand(message: BotMessage, groupId: string, text: string): Promise<string> {
    const [, rawSubcommand = 'help', ...rest] = text.split(/\s+/);
    const subcommand = rawSubcommand.toLowerCase();
    const args = rest.join(' ').trim();

    switch (subcommand) {
      case 'help':
        return HELP_TEXT;
      case 'template':
        return DOCUMENT_TEMPLATE;
      case 'status':
        return formatStatus(await this.service.getStatus(groupId));
      case 'import':
        if (!message.isAdmin) {
          return '❌ 仅管理员可以导入攻略文档';
        }
        this.sessions.start(message.origin, groupId);
        console.log(`[guide:bot] import session opened for ${message.origin}`);
        return formatImportStart(this.importTimeoutSeconds);
      case 'clear': {
        if (!message.isAdmin) {
          return '❌ 仅管理员可以清空知识库';
        }
        const removed = await this.service.clearDocuments({ scope: 'group', groupId });
        console.log(`[guide:bot] cleared ${removed} documents for group ${groupId}`);
        return `✅ 已清空群 ${groupId} 的覆盖知识库`;
      }
      case 'mode':
        return this.mode(groupId, args);
      default:
        return `未知子命令: ${subcommand}\n使用 /guide help 查看帮助`;
    }
  }

  private async mode(groupId: string, args: string): Promise<string> {
    if (!args) {
      const settings = await this.service.store.getGroupSettings(groupId);
      return `当前默认回答模式：${settings.defaultMode}`;
    }
    const mode = args.toLowerCase();
    if (!isAnswerMode(mode)) {
      return '❌ 模式只能是 simple 或 detail';
    }
    await this.service.setDefaultMode(groupId, mode);
    return `✅ 已将默认回答模式设置为：${mode}`;
  }

  private async finishImport(origin: string): Promise<string> {
    const session = this.sessions.finish(origin);
    if (!session) {
      return '当前没有进行中的导入会话';
    }
    if (session.texts.length === 0) {
      return '❌ 没有收到任何文本内容，导入已取消';
    }

    const name = importDocumentName(this.now());
    try {
      const result = await this.service.ingestDocument({
        name,
        rawText: session.texts.join('\n\n'),
        visibility: { scope: 'group', groupId: session.groupId },
      });
      if (!result) {
        return '❌ 没有收到任何文本内容，导入已取消';
      }
      return formatImportSuccess({
        docName: name,
        charCount: result.charCount,
        chunkCount: result.chunkCount,
        topTags: result.tagStats.slice(0, TOP_TAG_COUNT),
      });
    } catch (error) {
      console.error('[guide:bot] import failed:', error);
      return `❌ 导入失败：${describeError(error)}`;
    }
  }

  private async answer(groupId: string, question: string): Promise<string> {
    try {
      const outcome = await this.service.answer(question, { groupId });
      switch (outcome.kind) {
        case 'empty-question':
          return '请输入您的问题';
        case 'empty-knowledge-base':
          return EMPTY_KNOWLEDGE_BASE_TEXT;
        case 'no-results':
          return NO_RESULTS_TEXT;
        case 'llm-unavailable':
          return '❌ 没有可用的LLM提供者，请检查配置';
        case 'answered':
          return outcome.answer.trim() ? outcome.answer : '❌ LLM响应为空，请稍后重试';
      }
    } catch (error) {
      const status = getErrorStatus(error);
      console.error(`[guide:bot] answer failed${status ? ` (status ${status})` : ''}:`, error);
      return `❌ 查询失败：${describeError(error)}`;
    }
  }
}
