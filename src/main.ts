import { bootstrap } from './application/bootstrap.js';

const result = bootstrap();

if (!result.success) {
  process.exitCode = 1;
}
