/* eslint-disable import/no-unassigned-import */
import './env/lockdown.ts';
/* eslint-enable import/no-unassigned-import */

export { default } from './mtls-worker.ts';
