import { cleanEnv, num, str } from "envalid";

const env = cleanEnv(process.env, {
  DATABASE_PATH: str({ default: ":memory:" }),
  DATABASE_BUSY_TIMEOUT_MS: num({ default: 5000 }),
});

export default env;
