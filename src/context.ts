/**
 * Composition root. Everything the HTTP app and the CLI commands need is built here, once, from
 * an `AppConfig`; tests swap the upstream collaborators through `overrides`.
 */
import type { AppConfig } from './config';
import { ClientRegistrar } from './auth/clients';
import { TokenCipher } from './auth/crypto';
import { AuthorizationFlow } from './auth/flow';
import { SessionManager } from './auth/sessions';
import type { AuthStateStore } from './auth/storage';
import { createAuthStateStore, SqliteCredentialStore } from './auth/storage';
import type { Db } from './db/database';
import { openDatabase } from './db/database';
import type { IdentityProvider } from './lib/oidc';
import { OidcIdentityProvider } from './lib/oidc';
import type { Clock } from './lib/time';
import { systemClock } from './lib/time';
import { ToolDispatcher } from './mcp_server/dispatcher';
import type { CalendarClient } from './services/calendar';
import { GoogleCalendarClient } from './services/calendar';
import { TaskService } from './services/task_service';

export type AppContext = {
  config: AppConfig;
  db: Db;
  store: SqliteCredentialStore;
  states: AuthStateStore;
  sessions: SessionManager;
  clients: ClientRegistrar;
  provider: IdentityProvider;
  flow: AuthorizationFlow;
  tasks: TaskService;
  dispatcher: ToolDispatcher;
  close(): Promise<void>;
};

export type AppContextOverrides = {
  db?: Db;
  states?: AuthStateStore;
  provider?: IdentityProvider;
  calendar?: CalendarClient;
  clock?: Clock;
};

export const createAppContext = (config: AppConfig, overrides: AppContextOverrides = {}): AppContext => {
  const clock = overrides.clock ?? systemClock;
  const db = overrides.db ?? openDatabase(config.databasePath, { busyTimeoutMs: config.databaseBusyTimeoutMs });
  const store = new SqliteCredentialStore(db);
  const states = overrides.states ?? createAuthStateStore(config);
  const cipher = new TokenCipher(config.encryptionKey);

  const sessions = new SessionManager(store, cipher, clock);
  const clients = new ClientRegistrar(store, config.encryptionKey, clock);
  const provider =
    overrides.provider ??
    new OidcIdentityProvider(
      {
        issuer: config.oidcIssuer,
        clientId: config.oidcClientId,
        clientSecret: config.oidcClientSecret,
        scopes: config.oidcScopes,
      },
      clock
    );
  const flow = new AuthorizationFlow({
    provider,
    states,
    sessions,
    clients,
    store,
    defaultRedirectUri: config.oidcRedirectUri,
    stateTtlSeconds: config.authStateTtlSeconds,
    clock,
  });

  const tasks = new TaskService(db, overrides.calendar ?? new GoogleCalendarClient(config.calendarApiUrl), clock);
  const dispatcher = new ToolDispatcher({ sessions, tasks });

  return {
    config,
    db,
    store,
    states,
    sessions,
    clients,
    provider,
    flow,
    tasks,
    dispatcher,
    async close() {
      await states.close();
      db.close();
    },
  };
};
