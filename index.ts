import 'dotenv/config';
import { main } from './cli';
import { APP_PREFIX } from './constants';

main(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    console.error(`${APP_PREFIX} Unexpected failure:`, error);
    process.exitCode = 1;
  });
