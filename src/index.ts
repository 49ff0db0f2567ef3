import { loadConfig } from "./config.js";
import { logger, setLogLevel } from "./logger.js";
import { createApp } from "./transport.js";

const config = loadConfig();
setLogLevel(config.LOG_LEVEL);
const app = createApp(config);

app.listen(config.PORT, () => {
	logger.info("Citation server listening on port", config.PORT, `(default style: ${config.DEFAULT_STYLE})`);
});
