import { getBinding } from '@edgebind/bindings';

import { makeWorker } from './worker.ts';

export default makeWorker({
  resolve: (environment, name) =>
    getBinding(environment, name, 'mtlsCertificate'),
  toResponse: (response) => response.toResponse(),
});
