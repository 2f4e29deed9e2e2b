import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';
import { createServer } from './server.js';

const container = new AppContainer();
const app = createServer(container);
const port = container.config.server.port;

app.listen(port, () => {
  console.log(`🚀 Statement Reconciliation API listening on port ${port}`);
  console.log(`📊 Environment: ${process.env.NODE_ENV || 'development'}`);
  console.log(`🗄️ Storage: ${container.config.storage.driver}`);
  console.log(`🤖 Extraction configured: ${container.hasLiveExtraction()}`);
});
