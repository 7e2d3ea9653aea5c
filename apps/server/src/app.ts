import {
  AgentGatewayClient,
  ChatStore,
  SessionManager,
  configureLogger,
  createLogger,
  loadConfig,
  type AppConfig,
  type SocketFactory,
} from '@agent-studio/core';
import { GatewayServer } from '@agent-studio/gateway';

export interface StudioOptions {
  fetch?: typeof fetch;
  createSocket?: SocketFactory;
}

export interface Studio {
  config: Readonly<AppConfig>;
  store: ChatStore;
  sessions: SessionManager;
  agents: AgentGatewayClient;
  gateway: GatewayServer;
  start(): Promise<void>;
  stop(): Promise<void>;
}

/**
 * Wire every component from an environment record. Configuration is
 * validated first, so a ConfigError surfaces before the database is opened
 * or the agent service is contacted.
 */
export function createStudio(env: Record<string, string | undefined>, options: StudioOptions = {}): Studio {
  const config = loadConfig(env);
  configureLogger({ level: config.logLevel, pretty: config.nodeEnv === 'development' });
  const log = createLogger('studio');

  const store = new ChatStore(config.databasePath);
  const sessions = new SessionManager(store);
  const agents = new AgentGatewayClient({
    baseUrl: config.agentBaseUrl,
    apiKey: config.apiKey,
    streamTimeoutMs: config.streamTimeoutMs,
    fetch: options.fetch,
    createSocket: options.createSocket,
  });
  const gateway = new GatewayServer(
    {
      host: config.host,
      port: config.port,
      wsPath: config.wsPath,
      historyLimit: config.historyLimit,
      corsOrigins: config.corsOrigins,
    },
    { store, sessions, agents },
  );

  return {
    config,
    store,
    sessions,
    agents,
    gateway,
    async start() {
      await gateway.start();
      if (await agents.checkConnection()) {
        log.info({ baseUrl: config.agentBaseUrl }, 'Connected to agent service');
      } else {
        log.warn({ baseUrl: config.agentBaseUrl }, 'Cannot reach agent service, check AGENT_BASE_URL and RAGWALLA_API_KEY');
      }
    },
    async stop() {
      await gateway.stop();
      store.close();
    },
  };
}
