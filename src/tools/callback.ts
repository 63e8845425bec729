import type { AppConfig } from '../config/app.js';
import type { TemplateResponseT } from '../schemas/kakao.js';
import { postJSON } from '../util/fetch.js';

export interface CallbackSender {
  /** Delivers one envelope to the callback URL; throws on failure. */
  send(url: string, payload: TemplateResponseT): Promise<void>;
}

export function isDeliverableUrl(url: string): boolean {
  try {
    const u = new URL(url);
    return u.protocol === 'https:' || u.protocol === 'http:';
  } catch {
    return false;
  }
}

export function createCallbackSender(cfg: Pick<AppConfig['callback'], 'timeoutMs'>): CallbackSender {
  return {
    async send(url: string, payload: TemplateResponseT): Promise<void> {
      if (!isDeliverableUrl(url)) throw new Error('invalid_callback_url');
      await postJSON(url, payload, { target: 'kakao_callback', timeoutMs: cfg.timeoutMs });
    },
  };
}
