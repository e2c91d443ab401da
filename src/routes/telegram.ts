import { Express, Request, Response } from 'express';
import { UpdateHandler } from '../utils/bot-commands';
import { TelegramUpdateSchema } from '../utils/telegram-client';

export const TELEGRAM_WEBHOOK_PATH = '/telegram/webhook';
const SECRET_HEADER = 'x-telegram-bot-api-secret-token';

interface RegisterTelegramWebhookRouteOptions {
  app: Express;
  handleUpdate: UpdateHandler;
  secretToken?: string;
}

export const registerTelegramWebhookRoute = ({ app, handleUpdate, secretToken = '' }: RegisterTelegramWebhookRouteOptions) => {
  app.post(TELEGRAM_WEBHOOK_PATH, async (req: Request, res: Response) => {
    if (secretToken && req.get(SECRET_HEADER) !== secretToken) {
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }

    const parsed = TelegramUpdateSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid update payload.' });
      return;
    }

    // The update handler reports its own failures back to the chat.
    await handleUpdate(parsed.data);
    res.json({ ok: true });
  });
};
