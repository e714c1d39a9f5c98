import "dotenv/config";
import { createApp } from "./app.js";
import { getConfig } from "./lib/config.js";
import { initDataset } from "./lib/dataset.js";
import { errorMessage } from "./lib/errors.js";

const config = getConfig();
const app = createApp(config.FRONTEND_ORIGIN);
const port = Number(config.PORT) || 4000;

initDataset(config)
  .then(() => {
    app.listen(port, "0.0.0.0", () => {
      console.log(`[Server] Backend listening on port ${port}`);
    });
  })
  .catch((err: unknown) => {
    console.error("[Server] Dataset load failed:", errorMessage(err));
    process.exit(1);
  });
