import axios from 'axios';
import type { MappingConfig } from '../../config/mapping-config';
import { ConfigurationError } from '../../utils/errors';
import { CoindeskSource } from './coindesk-source';
import { PoloniexSource } from './poloniex-source';
import { SOURCE_NAMES, isSourceName } from './types';
import type { HttpClient, SourceClient } from './types';

export * from './types';
export { CoindeskSource } from './coindesk-source';
export { PoloniexSource, POLONIEX_PERIODS } from './poloniex-source';

export interface SourceClientOptions {
  http: HttpClient;
  now?: () => Date;
}

export function createHttpClient(timeoutMs: number): HttpClient {
  return axios.create({
    timeout: timeoutMs,
    headers: { Accept: 'application/json' },
  });
}

export function createSourceClient(
  name: string,
  config: MappingConfig,
  options: SourceClientOptions
): SourceClient {
  if (!isSourceName(name)) {
    throw new ConfigurationError(`No client for source '${name}'. Supported sources: ${SOURCE_NAMES.join(', ')}`, {
      source: name,
    });
  }

  const spec = config.getSource(name);
  switch (name) {
    case 'coindesk':
      return new CoindeskSource({ spec, ...options });
    case 'poloniex':
      return new PoloniexSource({ spec, ...options });
  }
}
