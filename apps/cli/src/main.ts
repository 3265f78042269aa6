import { createInterface } from 'node:readline';

import { parseCliConfig } from './config';
import { Session } from './session';

async function main() {
  const config = parseCliConfig(process.argv.slice(2), process.env);
  const session = new Session(config, {
    log: (line) => console.log(line),
    error: (line) => console.error(line),
  });
  session.start();

  const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: 'Enter a rotation: ' });
  try {
    rl.prompt();
    for await (const line of rl) {
      if (session.handle(line) === 'quit') break;
      rl.prompt();
    }
  } finally {
    rl.close();
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
