// Entry point for a worker thread: answers each message from the parent.
// `startThreadWorker` loads the compiled copy of this file from dist/.

import {parentPort} from 'node:worker_threads';
import {handleToWorkerMessage} from './puzzle-worker';
import type {ToWorkerMessage} from './worker-types';

if (!parentPort) {
  throw new Error('bootstrap-worker must be run as a worker thread');
}
const port = parentPort;
port.on('message', (message: ToWorkerMessage) => {
  handleToWorkerMessage(port, message);
});
