import type { AppConfig } from './lib/config.js';
import { createSupabaseAdmin } from './lib/supabase.js';
import { Dispatcher } from './outreach/dispatcher.js';
import { HistoryFilter } from './outreach/history-filter.js';
import { SupabaseContactHistoryStore, type ContactHistoryStore } from './outreach/history-store.js';
import { SmtpMailTransport, type MailTransport } from './outreach/mail-transport.js';
import type { PipelineServices } from './outreach/pipeline.js';
import { SearchClient } from './outreach/search-client.js';

export interface AppServices {
  config: Pick<AppConfig, 'http'>;
  store: ContactHistoryStore;
  historyFilter: HistoryFilter;
  pipeline: PipelineServices;
  close(): Promise<void>;
}

export interface ServiceOverrides {
  store?: ContactHistoryStore;
  transport?: MailTransport;
  searchClient?: SearchClient;
  sources?: PipelineServices['sources'];
}

/**
 * Wires every collaborator from one config object. Overrides let tests swap
 * the persistence, mail, search and discovery edges for in-process fakes.
 */
export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): AppServices {
  const store =
    overrides.store
    ?? new SupabaseContactHistoryStore(createSupabaseAdmin(config.supabase), config.supabase.table);
  const transport = overrides.transport ?? new SmtpMailTransport({ smtp: config.smtp, sender: config.sender });
  const searchClient = overrides.searchClient ?? new SearchClient({ settings: config.search });
  const historyFilter = new HistoryFilter(store);

  return {
    config: { http: config.http },
    store,
    historyFilter,
    pipeline: {
      searchClient,
      historyFilter,
      dispatcher: new Dispatcher({ transport, store, sender: config.sender, delayMs: config.dispatch.delayMs }),
      maxQueries: config.search.maxQueries,
      sources: overrides.sources,
    },
    async close() {
      transport.close();
    },
  };
}
