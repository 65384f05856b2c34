import * as readline from 'readline';
import mongoose from 'mongoose';
import { config } from './core/config';
import { errorMessage } from './core/errors';
import { createDefaultDeps } from './graph/deps';
import { runQuestion } from './graph/graph';
import { normalizeConsigneeCodes } from './utils/security';

async function initCLI() {
  const consigneeIds = normalizeConsigneeCodes(process.env.CLI_CONSIGNEE_SCOPE ?? process.argv.slice(2));
  if (consigneeIds.length === 0) {
    console.error('Usage: shipment-qna <consignee code>[,<consignee code>...]');
    process.exit(1);
  }

  await mongoose.connect(config.mongodb.uri, {
    dbName: config.mongodb.dbName,
  });
  const deps = createDefaultDeps();

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  console.log('\nShipment Q&A\n');
  console.log('Ask about a shipment or an aggregate figure, "new" to start over, "exit" to quit\n');

  let conversationId: string | undefined;

  const close = async () => {
    rl.close();
    await mongoose.disconnect();
  };

  const handle = async (input: string): Promise<boolean> => {
    const question = input.trim();

    if (question.toLowerCase() === 'exit') {
      console.log('\nGoodbye\n');
      await close();
      return false;
    }
    if (question.toLowerCase() === 'new') {
      conversationId = undefined;
      return true;
    }
    if (!question) return true;

    try {
      const response = await runQuestion({ question, conversationId, principal: { consigneeIds } }, deps);
      conversationId = response.conversationId;

      console.log('━'.repeat(80));
      console.log(response.answer);
      for (const notice of response.notices) {
        console.log(`  note: ${notice}`);
      }
      if (response.table) {
        console.table(response.table.rows);
      }
      console.log(`\n  intent: ${response.intent ?? 'none'}  evidence: ${response.evidence.length}  trace: ${response.traceId}`);
      console.log('━'.repeat(80) + '\n');
    } catch (error) {
      console.error('\nError:', errorMessage(error), '\n');
    }
    return true;
  };

  const askQuestion = () => {
    rl.question('shipments > ', input => {
      handle(input)
        .then(keepGoing => {
          if (keepGoing) askQuestion();
        })
        .catch((error: unknown) => {
          console.error('\nError:', errorMessage(error), '\n');
          process.exitCode = 1;
        });
    });
  };

  askQuestion();
}

if (require.main === module) {
  initCLI().catch((error: unknown) => {
    console.error(errorMessage(error));
    process.exit(1);
  });
}
