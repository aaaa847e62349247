/* eslint-disable no-console */
import 'dotenv/config';
import { getScoringConfig } from '../src/config/scoring';
import { closePool } from '../src/db';
import { loadCatalogFile } from '../src/domains/scoring/catalog';
import { PgDefinitionSource } from '../src/services/definitions.service';

async function main() {
  const config = getScoringConfig();
  const catalog = await loadCatalogFile(config.catalogPath);
  await new PgDefinitionSource().saveCatalog(catalog);
  console.log(
    `[seed:definitions] ${catalog.pillars.length} pillar(s), ${catalog.metrics.length} metric(s) from ${config.catalogPath}`
  );
}

main()
  .catch((err) => {
    console.error('[seed:definitions] Failed:', err);
    process.exitCode = 1;
  })
  .finally(() => closePool());
