import 'dotenv/config';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { createDefaultContext } from '../context';
import { DomainError } from '../core/errors';
import { closePool, ensureSchema, getPool } from '../db';
import { parseSegmentArgs } from './segmentArgs';

const argv = yargs(hideBin(process.argv))
  .scriptName('cutline-render')
  .option('user', {
    type: 'string',
    describe: 'Owner of the clips and project',
    demandOption: true,
  })
  .option('project', {
    type: 'string',
    describe: 'Project id',
    demandOption: true,
  })
  .option('create', {
    type: 'array',
    string: true,
    describe: 'Clip ids to concatenate into the project before rendering',
  })
  .option('keep', {
    type: 'array',
    string: true,
    describe: 'Segment to keep as START-END (seconds or HH:MM:SS); repeatable. Omit to derive from cut markers',
  })
  .option('cut', {
    type: 'array',
    number: true,
    describe: 'Add a cut marker at this many seconds before rendering; repeatable',
  })
  .option('audio', {
    type: 'string',
    describe: 'Replacement audio file name under the project music folder',
  })
  .option('summary', {
    type: 'boolean',
    default: false,
    describe: 'Print the project summary instead of rendering',
  })
  .strict()
  .parseSync();

async function main() {
  const db = getPool();
  await ensureSchema(db);
  const ctx = createDefaultContext(db);
  const userId = argv.user;
  const projectId = argv.project;

  if (argv.create && argv.create.length) {
    const created = await ctx.projects.createProject({ userId, projectId, videoIds: argv.create.map(String) });
    console.log(`Created ${created.outputFilename} (${created.totalDurationSeconds.toFixed(3)}s, ${created.entries.length} timeline entries)`);
  }

  if (argv.cut && argv.cut.length) {
    const entries = await ctx.projects.addCutMarkers(
      userId,
      projectId,
      argv.cut.map((time) => ({ time: Number(time), reason: '' }))
    );
    console.log(`Timeline now has ${entries.filter((e) => e.kind === 'cut').length} cut markers`);
  }

  if (argv.summary) {
    console.log(JSON.stringify(await ctx.projects.getProjectSummary(userId, projectId), null, 2));
    return;
  }

  const result = await ctx.projects.renderProject({
    userId,
    projectId,
    segmentsToKeep: parseSegmentArgs(argv.keep?.map(String)),
    audioFileName: argv.audio ?? null,
  });
  for (const w of result.warnings) console.warn(w);
  console.log(JSON.stringify(result, null, 2));
}

main()
  .catch((err) => {
    if (err instanceof DomainError) {
      console.error(`${err.code}: ${err.message}`);
    } else {
      console.error(err);
    }
    process.exitCode = 1;
  })
  .finally(() => closePool().catch((err) => console.warn('db_pool_close_failed', err)));
