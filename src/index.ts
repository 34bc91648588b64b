import 'dotenv/config';

import { createApp } from './app.js';
import { readConfig } from './config.js';
import { createPredictionStore } from './predictionStore.js';
import { createPredictionEngine } from './reasoner/engine.js';
import { loadKnowledge } from './reasoner/knowledge.js';
import { loadPresets } from './reasoner/probabilityTable.js';

const config = readConfig();

const kb = loadKnowledge(config.knowledgePath);
if (!kb.ok) {
  console.error(`[Engine] Failed to load knowledge base from ${config.knowledgePath}: ${kb.error.message}`);
  process.exit(1);
}
console.log(`[Engine] Loaded ${kb.value.diseases.length} disease profiles`);

const presets = loadPresets(config.presetsPath);
if (!presets.ok) {
  console.error(`[Engine] Failed to load test presets from ${config.presetsPath}: ${presets.error.message}`);
  process.exit(1);
}
console.log(`[Engine] Loaded ${presets.value.rows.length} test presets`);

const app = createApp({
  engine: createPredictionEngine(kb.value),
  store: createPredictionStore(config),
  presets: presets.value,
  config
});

app.listen(config.port, () => console.log(`Listening on port ${config.port}`));
