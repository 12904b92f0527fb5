import 'dotenv/config';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { SupabaseImageArchive } from './services/imageArchive.js';
import { createModelProvider } from './services/model.js';
import {
  DisabledPredictionStore,
  type PredictionRecordStore,
  SupabasePredictionStore
} from './services/predictionStore.js';
import { createSupabaseClient } from './services/supabase.js';

async function main(): Promise<void> {
  const config = loadConfig();

  const models = await createModelProvider(config.model.url, config.model.format);

  const supabase = createSupabaseClient(config);
  let store: PredictionRecordStore;
  if (supabase) {
    store = new SupabasePredictionStore(supabase, config.predictionsTable);
  } else {
    console.warn('[store] Supabase is not configured; predictions will not be persisted');
    store = new DisabledPredictionStore();
  }

  let archive: SupabaseImageArchive | null = null;
  if (config.storeImages) {
    if (supabase) {
      archive = new SupabaseImageArchive(supabase, config.storageBucket);
    } else {
      console.warn('[store] STORE_IMAGES is enabled but Supabase is not configured; images will not be archived');
    }
  }

  const app = createApp({
    models,
    store,
    archive,
    maxImageSizeBytes: config.maxImageSizeBytes,
    inferenceTimeoutMs: config.inferenceTimeoutMs,
    persistTimeoutMs: config.persistTimeoutMs,
    confidenceThreshold: config.confidenceThreshold,
    rateLimit: config.rateLimit
  });

  app.listen(config.port, () => {
    console.log(`API running on http://localhost:${config.port}`);
  });
}

main().catch(error => {
  console.error(error);
  process.exit(1);
});
