#!/usr/bin/env node
import 'reflect-metadata';
import * as readline from 'readline';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { ChatSessionService } from './modules/chat/chat-session.service';
import { Repl } from './cli/repl';

async function main() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['warn', 'error'],
  });

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

  try {
    await new Repl(app.get(ChatSessionService), rl).run();
  } finally {
    rl.close();
    await app.close();
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
