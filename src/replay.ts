import fs from 'fs';
import path from 'path';
import { createLeakEngine } from './index';
import { parsePersona } from './services/persona-catalog';
import { parseReplayWindow } from './replay-window';

/**
 * Replay a saved message window through the engine and print the outcome.
 *
 *   npm run replay -- [window.json] [persona]
 */

const DEFAULT_WINDOW_PATH = path.resolve(__dirname, '../fixtures/sample-window.json');

async function main() {
  const [windowPath = DEFAULT_WINDOW_PATH, personaArg] = process.argv.slice(2);

  const window = parseReplayWindow(JSON.parse(fs.readFileSync(windowPath, 'utf-8')));
  const engine = createLeakEngine();
  const persona = personaArg ? parsePersona(personaArg) : engine.defaultPersona;

  console.log(`[replay] ${window.messages.length} messages from ${windowPath}`);
  console.log(`[replay] Persona: ${persona}`);

  const outcome = await engine.orchestrator.generateLeak(
    window.messages,
    window.communityId,
    window.invokingUserId,
    persona
  );

  console.log(`[replay] States: ${outcome.states.join(' -> ')}`);
  if (outcome.status !== 'generated') {
    console.log(`[replay] Outcome: ${outcome.status}`);
    return;
  }

  console.log(`\nTarget: ${outcome.target.displayName} (${outcome.target.userId})`);
  console.log(`Strategy: ${outcome.strategy}`);
  console.log(`\n${outcome.leak.content}`);
  console.log(`\nReliability: ${outcome.leak.reliabilityPercentage}%`);
  console.log(`Source: ${outcome.leak.sourceAttribution}`);
  console.log(`\n${outcome.leak.reasoning}`);
}

main().catch(error => {
  console.error('Fatal error:', error);
  process.exit(1);
});
