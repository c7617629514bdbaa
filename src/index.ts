import { loadChannelMap } from './channels.js';
import { loadConfig } from './config.js';
import { IrcSession } from './irc/session.js';
import { logError, logInfo, setLogLevel } from './logger.js';
import { LogsTfClient } from './logstf/client.js';
import { DeliveryPipeline } from './relay/delivery.js';
import { NotificationGate } from './relay/gate.js';
import { PollingSupervisor } from './relay/supervisor.js';

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  const channels = await loadChannelMap(config.channelsFile);

  const logs = new LogsTfClient({
    apiBase: config.logs.apiBase,
    requestTimeoutMs: config.logs.requestTimeoutMs,
  });

  const gate = new NotificationGate({
    staleThresholdMs: config.relay.staleThresholdMs,
  });

  const delivery = new DeliveryPipeline({
    spoilerDelayMs: config.relay.spoilerDelayMs,
    linkBase: config.logs.linkBase,
    announceElapsed: config.relay.announceElapsed,
  });

  const supervisor = new PollingSupervisor({
    channels,
    createSession: () =>
      new IrcSession({
        host: config.irc.host,
        port: config.irc.port,
        username: config.irc.username,
        oauthKey: config.irc.oauthKey,
        serverName: config.irc.serverName,
        connectTimeoutMs: config.irc.connectTimeoutMs,
        readTimeoutMs: config.irc.readTimeoutMs,
      }),
    logs,
    gate,
    delivery,
    pollIntervalMs: config.relay.pollIntervalMs,
    reconnectBackoffMs: config.irc.reconnectBackoffMs,
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logInfo(`Received ${signal}, shutting down...`);

    try {
      await supervisor.stop();
    } catch (error) {
      logError('Shutdown error', error);
    } finally {
      process.exit(0);
    }
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  logInfo('Starting logs chat relay');
  logInfo(`IRC server: ${config.irc.host}:${config.irc.port} as ${config.irc.username}`);
  logInfo(`Tracking ${channels.size} player(s) from ${config.channelsFile}`);
  logInfo(`Poll interval: ${config.relay.pollIntervalMs}ms`);
  logInfo(`Spoiler delay: ${config.relay.spoilerDelayMs}ms`);
  logInfo(`Stale threshold: ${config.relay.staleThresholdMs}ms`);
  logInfo(`Reconnect backoff: ${config.irc.reconnectBackoffMs}ms`);

  await supervisor.start();
}

void main().catch((error) => {
  logError('Fatal startup error', error);
  process.exit(1);
});
