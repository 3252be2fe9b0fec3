import { loadConfig } from "./config.js";
import { buildApp } from "./app.js";

const config = loadConfig(process.env);
const app = buildApp({ config });

app.listen(config.PORT, () => {
  console.log(`pdf-warden API ${config.VERSION} listening on ${config.BASE_URL} (upload limit ${config.MAX_UPLOAD_BYTES} bytes)`);
});
