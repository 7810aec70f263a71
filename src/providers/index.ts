import { MailProvider } from './base.js';
import { JmapProvider } from './jmap.js';
import { Config } from '../config.js';

export function createProvider(config: Config): MailProvider {
  return new JmapProvider({
    token: config.token,
    sessionUrl: config.sessionUrl,
    requestTimeoutMs: config.requestTimeoutMs,
  });
}

export { MailProvider } from './base.js';
export { JmapProvider } from './jmap.js';
