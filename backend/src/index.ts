import { createApp } from "./app";
import { config } from "./config";
import { createMvgClient } from "./mvg/client";
import { initializePolling, stopPolling } from "./polling/startPolling";
import { loadSensorConfig } from "./sensors/sensorConfig";
import { setupSensors } from "./sensors/setupSensors";
import { logger } from "./utils/logger";

const main = async () => {
  const sensorConfig = await loadSensorConfig(config.sensorsConfigPath);
  const client = createMvgClient();
  const sensors = await setupSensors(client, sensorConfig.nextdeparture);
  const polling = initializePolling(sensors);
  const app = createApp({ sensors, client, config });

  const server = app.listen(config.port, () => {
    logger.info(`Sensor host listening on http://localhost:${config.port}`, { sensors: sensors.length });
  });

  const shutdown = () => {
    logger.info("Shutting down server...");
    stopPolling(polling);
    server.close(() => {
      process.exit(0);
    });
  };

  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
};

main().catch((error) => {
  logger.error("Failed to start sensor host", { message: String(error) });
  process.exit(1);
});
