/**
 * create-story: run one project end to end from the command line
 *
 *   npm run create-story -- "fox and owl solve mysteries in watercolor style"
 */

import { logger } from '../src/config/logger.js';
import { closeWorkflowsDatabaseConnection } from '../src/db/workflows-db.js';
import { CREATE_STORY_USAGE, CliUsageError, parseCreateStoryArgs, type CreateStoryArgs } from '../src/cli/create-story-args.js';
import type { Project, ProjectSnapshot } from '../src/shared/types.js';
import { InvalidBriefError } from '../src/workflows/errors.js';
import { createEngineFromEnvironment } from '../src/workflows/engine-factory.js';

function describeTransition(snapshot: ProjectSnapshot, verbose: boolean): string {
  const { project } = snapshot;
  const lines = [`→ ${snapshot.transition}`];
  if (verbose) {
    if (snapshot.state === 'styling') {
      lines.push(`  outline: ${project.pages.length} pages, characters: ${project.characters.map((c) => c.name).join(', ') || 'none'}`);
    }
    if (snapshot.state === 'drafting_art' && project.styleReference) {
      lines.push(`  style reference: ${project.styleReference.image.uri}`);
    }
    for (const render of project.renders) {
      lines.push(`  page ${render.pageIndex}: ${render.verdict} (retries ${render.retryCount})`);
    }
    for (const warning of project.warnings) {
      lines.push(`  warning: ${warning.message}`);
    }
  }
  return lines.join('\n');
}

function report(project: Project): number {
  if (project.state === 'exported' && project.document) {
    console.log(`✓ "${project.title}" exported with ${project.document.pageCount} pages`);
    console.log(`✓ Files saved to: ${project.document.uri}`);
    return 0;
  }

  const failure = project.failure;
  console.error(`❌ ${failure ? `[${failure.code}] ${failure.message}` : `project ended in state ${project.state}`}`);
  for (const render of project.renders.filter((r) => r.verdict === 'failed')) {
    console.error(`   page ${render.pageIndex}: ${render.lastError ?? 'failed'}`);
  }
  return 1;
}

async function createStory(args: CreateStoryArgs): Promise<number> {
  if (args.debug) {
    logger.level = 'debug';
  }

  console.log(`Topic: ${args.topic}`);
  if (args.timeoutMinutes) {
    console.log(`Timeout: ${args.timeoutMinutes} minutes`);
  }

  const engine = createEngineFromEnvironment(
    args.timeoutMinutes ? { runTimeoutMs: args.timeoutMinutes * 60 * 1000 } : {},
  );
  const project = await engine.createProject({ brief: args.topic });
  console.log(`Project ${project.id}: "${project.title}", ${project.targetPageCount} pages, ${project.styleDescriptor}`);

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort('interrupted'));

  const finished = await engine.run(project, {
    signal: controller.signal,
    onTransition: (snapshot) => console.log(describeTransition(snapshot, args.verbose)),
  });
  return report(finished);
}

async function main(): Promise<void> {
  let args: CreateStoryArgs;
  try {
    args = parseCreateStoryArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(`❌ ${error.message}\n`);
      console.error(CREATE_STORY_USAGE);
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  if (args.help) {
    console.log(CREATE_STORY_USAGE);
    return;
  }

  try {
    process.exitCode = await createStory(args);
  } catch (error) {
    if (error instanceof InvalidBriefError) {
      console.error(`❌ ${error.message}`);
    } else {
      console.error(`❌ Setup error: ${error instanceof Error ? error.message : String(error)}`);
    }
    process.exitCode = 1;
  } finally {
    await closeWorkflowsDatabaseConnection();
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
