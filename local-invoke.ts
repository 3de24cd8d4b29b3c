// local-invoke.ts

import dotenv from 'dotenv';
dotenv.config({ path: '.env.local' }); // Load .env.local explicitly
import fs from 'fs';
import { handler } from './src/sms/sms.lambda';

const eventPath = process.argv[2] || 'events/test-event.json';

const invoke = async () => {
  const event: unknown = JSON.parse(fs.readFileSync(eventPath, 'utf-8'));
  const result = await handler(event);
  console.log('Handler result:', result);
};

invoke().catch((error) => {
  console.error('Local invocation failed:', error);
  process.exitCode = 1;
});
