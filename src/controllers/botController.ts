import { Request, Response } from 'express';
import { z } from 'zod';
import { getGuideBot } from '../services/guide';
import { sendLlmError } from './guideController';

const botEventSchema = z.object({
  origin: z.string().trim().min(1).max(200),
  groupId: z.string().trim().min(1).max(64).optional(),
  isAdmin: z.boolean().default(false),
  text: z.string().max(100_000),
  mentioned: z.boolean().default(false),
});

export async function handleBotEvent(req: Request, res: Response): Promise<void> {
  const parsed = botEventSchema.safeParse(req.body);
  if (!parsed.success) {
    res.status(400).json({ message: 'Invalid payload', errors: parsed.error.flatten() });
    return;
  }

  try {
    const reply = await getGuideBot().handle(parsed.data);
    res.status(200).json({ reply });
  } catch (error) {
    sendLlmError(res, error, 'bot event');
  }
}
