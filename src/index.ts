import { config, validateConfig } from './config';
import { createApp } from './app';
import { ConfigFile } from './services/configFile';
import { ConfigStore } from './services/configStore';

async function main() {
  // 验证配置
  validateConfig();

  const configFile = new ConfigFile(config.configFile);
  const store = await ConfigStore.open(configFile);
  const app = createApp(store);

  const server = app.listen(config.port, () => {
    console.log(`
╔═══════════════════════════════════════════════════════╗
║   Cloudflare DDNS Config API Server                   ║
║                                                       ║
║   环境: ${config.nodeEnv.padEnd(46)}║
║   端口: ${config.port.toString().padEnd(46)}║
║   账户: ${store.listAccounts().length.toString().padEnd(46)}║
║                                                       ║
║   配置文件: ${configFile.filePath}
╚═══════════════════════════════════════════════════════╝
    `);
  });

  // 优雅关闭
  const shutdown = (signal: string) => {
    console.log(`\n收到 ${signal} 信号，正在关闭服务器...`);
    server.close(() => process.exit(0));
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error) => {
  console.error('启动失败:', error);
  process.exit(1);
});
