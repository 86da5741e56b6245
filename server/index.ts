import express = require("express");
import * as http from "http";
import process = require("process");
import { Trace } from "jinaga";

import { configFromEnvironment, ProjectorServer } from "../src";

const app = express();
const server = http.createServer(app);

app.set('port', process.env.PORT || 8080);

const { handler, close } = ProjectorServer.create(configFromEnvironment(process.env));

process.on('SIGINT', () => {
  console.log("\n\nStopping field projector\n");
  server.close();
  close()
    .then(() => process.exit(0))
    .catch(error => {
      Trace.error(error);
      process.exit(1);
    });
});

app.use('/api', handler);

// Global error handler - must be added AFTER all routes
app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
  const errorDetails = {
    message: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
    path: req.path,
    method: req.method
  };
  Trace.error(`Unhandled error: ${JSON.stringify(errorDetails, null, 2)}`);

  // If headers already sent, delegate to default Express error handler
  if (res.headersSent) {
    return next(err);
  }

  res.status(500).json({
    error: "InternalError",
    message: "An unexpected error occurred."
  });
});

server.listen(app.get('port'), () => {
  console.log(`  Field projector is running at http://localhost:${app.get('port')}/api in ${app.get('env')} mode`);
  console.log('  Press CTRL-C to stop\n');
});
