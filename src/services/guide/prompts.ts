import type { GuideChunk } from './types';

export type AnswerMode = 'simple' | 'detail';

export function isAnswerMode(value: string): value is AnswerMode {
  return value === 'simple' || value === 'detail';
}

const GROUNDING_RULES = [
  '你是《Limbus Company》（边狱巴士）的攻略问答助手，只依据下方提供的参考资料回答玩家的问题。',
  '',
  '## 作答规则',
  '1. 只使用参考资料中出现的信息；资料里找不到答案时，直接说明“资料不足以确定”。',
  '2. 不要编造数值（伤害、概率、倍率）、机制细节、版本改动或人格/EGO 的技能效果。',
  '3. 资料不完整时，分开说明已确认的内容和无法确认的内容，并告诉玩家还需要补充哪些资料；如给出推测，必须标注为推测。',
  '4. 引用资料时标注 chunk 编号，格式为 [chunk:X]。',
  '',
  '## 术语',
  '- 罪孽(Sin)：暴食、色欲、懒惰、暴怒、忧郁、傲慢、嫉妒',
  '- 状态：燃烧(Burn)、流血(Bleed)、震颤(Tremor)、破裂(Rupture)、沉沦(Sinking)、蓄力(Poise)、充能(Charge)',
  '- 伤害类型：斩击(Slash)、穿刺(Pierce)、钝击(Blunt)',
].join('\n');

const SIMPLE_FORMAT = [
  '## 回答格式（简版）',
  '1. 一句话结论：先回答核心问题。',
  '2. 要点：3-6 条，每条不超过两行。',
  '3. 注意事项：1-3 条常见失误。',
  '4. 资料不足说明：如有无法确认的部分，列出来。',
].join('\n');

const DETAIL_FORMAT = [
  '## 回答格式（详版）',
  '1. 概览：完整回答的摘要。',
  '2. 机制与条件：相关机制、触发条件与结算方式。',
  '3. 详细步骤：按阶段给出操作和注意点。',
  '4. 替代方案：可替换的人格/EGO，或低练度方案。',
  '5. 常见问题：容易踩的坑，可用问答形式补充。',
  '6. 引用来源：列出用到的 [chunk:X]。',
  '7. 资料不足说明：无法确认的信息与建议补充的内容。',
].join('\n');

const DETAIL_TRIGGERS = [
  '详细',
  '展开',
  '详细说',
  '详细讲',
  '机制',
  '原理',
  '为什么',
  '配装',
  '怎么配',
  '怎么搭',
  '长一点',
  '详细点',
  '具体',
  '深入',
  '解释',
  '说明',
];

export function buildSystemPrompt(mode: AnswerMode = 'simple'): string {
  return `${GROUNDING_RULES}\n\n${mode === 'detail' ? DETAIL_FORMAT : SIMPLE_FORMAT}`;
}

type PromptChunk = Pick<GuideChunk, 'id' | 'content' | 'tags' | 'scope'>;

export function buildContextPrompt(chunks: readonly PromptChunk[], question: string): string {
  if (chunks.length === 0) {
    return [`用户问题：${question}`, '', '注意：没有检索到相关参考资料，请提示用户先导入攻略文档。'].join('\n');
  }

  const context = chunks
    .map((chunk) => {
      const source = `[来源: ${chunk.scope === 'global' ? '全局库' : '群覆盖库'}]`;
      const tags = chunk.tags.length ? ` [标签: ${chunk.tags.join(', ')}]` : '';
      return `--- Chunk ${chunk.id} ${source}${tags} ---\n${chunk.content}`;
    })
    .join('\n\n');

  return [
    '## 参考资料',
    '',
    context,
    '',
    '---',
    '',
    '## 用户问题',
    '',
    question,
    '',
    '请只根据以上参考资料作答：不确定的地方要说明，并标注引用的 chunk 编号。',
  ].join('\n');
}

export function detectModeFromQuery(question: string, defaultMode: AnswerMode = 'simple'): AnswerMode {
  const lowered = question.toLowerCase();
  return DETAIL_TRIGGERS.some((trigger) => lowered.includes(trigger)) ? 'detail' : defaultMode;
}

export const DOCUMENT_TEMPLATE = `# Limbus Company 攻略文档模板

## 文档信息
- 文档名：
- 版本/更新时间：
- 适用模式：主线 / 镜牢 / 铁道 / 活动

## 【术语与机制】
### 拼点与硬币
- 拼点规则：
- 速度影响：
### 罪孽与共鸣
- 共鸣条件：
### 状态效果
- 燃烧(Burn)：
- 流血(Bleed)：
- 震颤(Tremor)：
- 破裂(Rupture)：
- 沉沦(Sinking)：
- 蓄力(Poise)：

## 【人格指南】
### 人格：[名称]
- 定位：输出/坦克/辅助/控场
- 技能要点：
- 适用场景：
- 替代方案：

## 【EGO 指南】
### EGO：[名称]
- 所属角色：
- 资源消耗：
- 使用时机与侵蚀风险：

## 【配队/构筑】
### [体系名] 配队
- 核心成员：
- 替补：
- 打法思路：

## 【关卡/模式攻略】
### [模式或关卡]
- 推荐配队：
- 步骤：
- 常见坑：

## 【FAQ】
Q:
A:

---
标签提示：正文里写出“拼点、罪孽、人格、EGO、镜牢、铁道、燃烧/Burn”等关键词，检索效果更好。
`;

export const HELP_TEXT = `📖 Limbus Company 攻略查询

基本用法：
- @机器人 + 问题，例如：@机器人 燃烧队怎么配？

管理员指令：
- /guide import  开始导入本群攻略（随后发送文本，/done 结束，/cancel 取消）
- /guide clear   清空本群覆盖库

通用指令：
- /guide help             查看帮助
- /guide template         获取文档模板
- /guide status           查看知识库状态
- /guide mode simple|detail  设置默认回答模式

问题中包含“详细、展开、机制、原理、配装、怎么配”等词时会自动使用详版回答。
检索会同时覆盖全局库与本群覆盖库，本群内容优先。`;

export interface StatusReport {
  groupId: string;
  defaultMode: AnswerMode;
  lastImportAt?: Date;
  globalDocs: number;
  globalChunks: number;
  groupDocs: number;
  groupChunks: number;
  topK: number;
  chunkSize: number;
  overlap: number;
}

export function formatStatus(report: StatusReport): string {
  const lastImport = report.lastImportAt ? report.lastImportAt.toISOString().slice(0, 19) : '从未导入';
  return [
    '📊 知识库状态',
    '',
    `群号：${report.groupId}`,
    `默认模式：${report.defaultMode}`,
    `最后导入：${lastImport}`,
    '',
    `全局文档：${report.globalDocs} 篇 / ${report.globalChunks} 条 chunk`,
    `群覆盖文档：${report.groupDocs} 篇 / ${report.groupChunks} 条 chunk`,
    '',
    `TopK：${report.topK}，Chunk 大小：${report.chunkSize}，重叠：${report.overlap}`,
  ].join('\n');
}

export function formatImportStart(timeoutSeconds: number): string {
  return [
    '📥 导入模式已开启',
    '',
    `请在 ${timeoutSeconds} 秒内发送攻略文本（可以分多条发送），完成后发送 /done。`,
    '发送 /cancel 取消导入。建议先用 /guide template 获取模板。',
  ].join('\n');
}

export interface ImportSummary {
  docName: string;
  charCount: number;
  chunkCount: number;
  topTags: Array<[string, number]>;
}

export function formatImportSuccess(summary: ImportSummary): string {
  const tags = summary.topTags.length
    ? summary.topTags.map(([tag, count]) => `- ${tag}: ${count}次`).join('\n')
    : '- 无标签';
  return [
    '✅ 导入成功',
    '',
    `文档名：${summary.docName}`,
    `字符数：${summary.charCount}`,
    `Chunk 数：${summary.chunkCount}`,
    '',
    '主要标签：',
    tags,
  ].join('\n');
}
