import { config } from '../config';
import { ConfigFile } from '../services/configFile';

/**
 * 维护脚本：为旧版配置文件中缺少 id 的账户、Zone、子域名补全 id 并写回
 */
async function backfillIds() {
  const file = new ConfigFile(config.configFile);
  console.log(`读取配置文件 ${file.filePath}...`);

  const { config: loaded, backfilled } = await file.load();
  if (backfilled === 0) {
    console.log('所有条目均已有 id，无需修改');
    return;
  }

  await file.save(loaded);
  console.log(`✓ 已补全 ${backfilled} 个 id`);
}

backfillIds().catch((error) => {
  console.error('补全失败:', error);
  process.exit(1);
});
