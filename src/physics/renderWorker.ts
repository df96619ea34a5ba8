import { parentPort, workerData } from 'worker_threads';
import { deserializeScene } from '../state/sceneSerializer';
import { renderRows } from './Renderer';
import { RenderJob, RenderJobResult, isRenderJob } from './RenderPool';

// Entry point for RenderPool worker threads: rebuild the scene, trace one band, send it back.
function run(job: RenderJob) {
    const scene = deserializeScene(job.sceneText);
    const rows = renderRows(scene, job.config, job.start, job.end);
    const result: RenderJobResult = { start: job.start, rows };
    parentPort?.postMessage(result, [rows.buffer]);
}

const job: unknown = workerData;
if (!isRenderJob(job)) {
    throw new Error('renderWorker: malformed job in workerData');
}
run(job);
