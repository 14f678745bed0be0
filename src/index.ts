import dotenv from "dotenv";
import { loadConfig } from "./modules/config/app.config";
import { createApp } from "./server/app";
import { createContainer } from "./server/container";

dotenv.config();

const config = loadConfig();
const app = createApp(createContainer(config));

app.listen(config.server.port, () => {
  console.log(`Backend server is running on http://localhost:${config.server.port}`);
});
