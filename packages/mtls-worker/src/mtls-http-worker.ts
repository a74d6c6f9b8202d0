import { getBinding, toResponse } from '@edgebind/bindings/http';

import { makeWorker } from './worker.ts';

export default makeWorker({
  resolve: (environment, name) =>
    getBinding(environment, name, 'mtlsCertificate'),
  toResponse,
});
