import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';
import { createApp } from './infrastructure/http/createApp.js';

const container = new AppContainer();
const app = createApp(container);
const port = container.config.app.port;

app.listen(port, () => {
  container.logger.info(
    {
      port,
      model: container.config.oracle.model,
      oracleConfigured: container.hasLiveOracle(),
      artifactDir: container.config.app.artifactDir ?? '(memory)',
    },
    'Kontoauszug audit API listening',
  );
});
