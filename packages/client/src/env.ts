import { cleanEnv, num, str } from "envalid";

const env = cleanEnv(process.env, {
  DB_PATH: str({ default: ":memory:" }),
  DB_BUSY_TIMEOUT_MS: num({ default: 5000 }),
});

export default env;
