/**
 * Tests for the build steps.
 */

import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import type { MockAgent } from 'undici';
import {
  BuildRun,
  DeleteVdbStep,
  InMemoryLogger,
  PluginConfigurationBuilder,
  ProvisionVdbStep,
  SelfServiceBookmarkStep,
  SelfServiceContainerStep,
  StaticCredentialStore,
  ConsoleLogger,
  createClientFactory,
  createStepContext,
  type PluginConfiguration,
  type StepContext,
} from '../index.js';
import {
  API,
  DCT_URL,
  ENGINE_URL,
  createMockAgent,
  engineError,
  headerValue,
  ok,
  reply,
  replyLogin,
  type RecordedRequest,
} from './mock-server.js';

const ENGINE = 'test-engine';

let agent: MockAgent;
let workspace: string;

beforeEach(async () => {
  agent = createMockAgent();
  workspace = await mkdtemp(path.join(tmpdir(), 'delphix-steps-'));
});

afterEach(async () => {
  await agent.close();
  await rm(workspace, { recursive: true, force: true });
});

function configuration(options: { dct?: boolean } = {}): PluginConfiguration {
  const builder = new PluginConfigurationBuilder()
    .engine(ENGINE, 'engine.test', 'admin', 'test-secret')
    .jobPollInterval(1)
    .dctPollInterval(1);
  if (options.dct ?? true) {
    builder.dctUrl(DCT_URL);
  }
  return builder.build();
}

function context(config: PluginConfiguration = configuration()): StepContext & { log: InMemoryLogger } {
  return {
    run: new BuildRun('42', workspace),
    log: new InMemoryLogger(),
    config,
    credentials: new StaticCredentialStore({ 'dct-key': 'test-secret' }),
    clients: createClientFactory(config, { dispatcher: agent }),
  };
}

function job(state: string, title: string, ...messages: string[]): object {
  return ok({
    type: 'Job',
    reference: 'JOB-5',
    jobState: state,
    title,
    events: messages.map((messageDetails) => ({ messageDetails })),
  });
}

describe('SelfServiceBookmarkStep', () => {
  it('should create a bookmark on the active branch and poll its job', async () => {
    const requests: RecordedRequest[] = [];
    replyLogin(agent);
    reply(
      agent,
      ENGINE_URL,
      'GET',
      `${API}/jetstream/container/JS_DATA_CONTAINER-1`,
      ok({ type: 'JSDataContainer', reference: 'JS_DATA_CONTAINER-1', name: 'dev', activeBranch: 'JS_BRANCH-1' })
    );
    reply(
      agent,
      ENGINE_URL,
      'POST',
      `${API}/jetstream/bookmark`,
      ok('JS_BOOKMARK-7', { job: 'JOB-5', action: 'ACTION-9' }),
      { requests }
    );
    reply(
      agent,
      ENGINE_URL,
      'GET',
      `${API}/action/ACTION-9`,
      ok({ type: 'Action', reference: 'ACTION-9', state: 'EXECUTING', title: 'Create bookmark' })
    );
    reply(agent, ENGINE_URL, 'GET', `${API}/job/JOB-5`, job('RUNNING', 'Create bookmark', 'Creating bookmark'));
    reply(
      agent,
      ENGINE_URL,
      'GET',
      `${API}/job/JOB-5`,
      job('COMPLETED', 'Create bookmark', 'Creating bookmark', 'Bookmark created')
    );

    const ctx = context();
    const step = new SelfServiceBookmarkStep({
      engine: ENGINE,
      bookmark: '',
      container: 'JS_DATA_CONTAINER-1',
      operation: 'Create',
    });
    await step.perform(ctx);

    expect(JSON.parse(requests[0].body)).toEqual({
      type: 'JSBookmarkCreateParameters',
      bookmark: { type: 'JSBookmark', name: 'Created By Pipeline', branch: 'JS_BRANCH-1' },
      timelinePointParameters: {
        type: 'JSTimelinePointLatestTimeInput',
        sourceDataLayout: 'JS_DATA_CONTAINER-1',
      },
    });
    expect(ctx.run.getPublishedReferences(ENGINE)).toEqual(['JS_BOOKMARK-7', 'JOB-5']);
    expect(ctx.log.getMessages()).toEqual(['Creating bookmark', 'Bookmark created']);
    agent.assertNoPendingInterceptors();
  });

  it('should stop once the action has already completed', async () => {
    replyLogin(agent);
    reply(
      agent,
      ENGINE_URL,
      'POST',
      `${API}/jetstream/bookmark/JS_BOOKMARK-3/delete`,
      ok(null, { job: 'JOB-6', action: 'ACTION-4' })
    );
    reply(
      agent,
      ENGINE_URL,
      'GET',
      `${API}/action/ACTION-4`,
      ok({ type: 'Action', reference: 'ACTION-4', state: 'COMPLETED', title: 'Delete bookmark' })
    );

    const ctx = context();
    await new SelfServiceBookmarkStep({
      engine: ENGINE,
      bookmark: 'JS_BOOKMARK-3',
      container: '',
      operation: 'Delete',
    }).perform(ctx);

    expect(ctx.log.getMessages()).toEqual(['Delete bookmark: COMPLETED']);
    expect(ctx.run.getActions()).toEqual([]);
    agent.assertNoPendingInterceptors();
  });

  it('should publish the bookmark and job of a share', async () => {
    replyLogin(agent);
    reply(agent, ENGINE_URL, 'POST', `${API}/jetstream/bookmark/JS_BOOKMARK-3/share`, ok(null, { job: 'JOB-5' }));
    reply(agent, ENGINE_URL, 'GET', `${API}/job/JOB-5`, job('COMPLETED', 'Share bookmark'));

    const ctx = context();
    await new SelfServiceBookmarkStep({
      engine: ENGINE,
      bookmark: 'JS_BOOKMARK-3',
      container: '',
      operation: 'Share',
    }).perform(ctx);

    expect(ctx.run.getPublishedReferences(ENGINE)).toEqual(['JS_BOOKMARK-3', 'JOB-5']);
    expect(ctx.log.getMessages()).toEqual(['Share bookmark COMPLETED']);
  });

  it('should log an undefined operation', async () => {
    replyLogin(agent);

    const ctx = context();
    await new SelfServiceBookmarkStep({
      engine: ENGINE,
      bookmark: 'JS_BOOKMARK-3',
      container: '',
      operation: 'Update',
    }).perform(ctx);

    expect(ctx.log.getMessages()).toEqual(['Undefined Self Service Bookmark Operation']);
    agent.assertNoPendingInterceptors();
  });

  it('should warn about an unset bookmark and carry on', async () => {
    replyLogin(agent);
    reply(agent, ENGINE_URL, 'POST', `${API}/jetstream/bookmark/NULL/share`, ok(null));

    const ctx = context();
    await new SelfServiceBookmarkStep({
      engine: ENGINE,
      bookmark: 'NULL',
      container: '',
      operation: 'Share',
    }).perform(ctx);

    expect(ctx.log.getMessages()).toEqual(['Invalid Delphix Engine environment: test-engine']);
    agent.assertNoPendingInterceptors();
  });

  it('should log an unknown engine without contacting anything', async () => {
    const ctx = context();
    await new SelfServiceBookmarkStep({
      engine: 'staging',
      bookmark: 'JS_BOOKMARK-3',
      container: '',
      operation: 'Delete',
    }).perform(ctx);

    expect(ctx.log.getMessages()).toEqual(['Invalid Delphix Engine environment: staging']);
  });

  it('should write to the console log of an assembled context', async () => {
    const lines: string[] = [];
    const ctx = createStepContext(
      new BuildRun('42', workspace),
      configuration(),
      new StaticCredentialStore({}),
      { log: new ConsoleLogger({ write: (line) => lines.push(line) }), dispatcher: agent }
    );
    await new SelfServiceBookmarkStep({
      engine: 'staging',
      bookmark: 'JS_BOOKMARK-3',
      container: '',
      operation: 'Delete',
    }).perform(ctx);

    expect(lines).toEqual(['ERROR: Invalid Delphix Engine environment: staging']);
  });

  it('should default an assembled context to the console logger', () => {
    const ctx = createStepContext(new BuildRun('42', workspace), configuration(), new StaticCredentialStore({}));
    expect(ctx.log).toBeInstanceOf(ConsoleLogger);
  });

  it('should report an unreachable engine', async () => {
    agent
      .get(ENGINE_URL)
      .intercept({ path: `${API}/session`, method: 'POST' })
      .replyWithError(new Error('connect ECONNREFUSED'));

    const ctx = context();
    await new SelfServiceBookmarkStep({
      engine: ENGINE,
      bookmark: 'JS_BOOKMARK-3',
      container: '',
      operation: 'Delete',
    }).perform(ctx);

    expect(ctx.log.getMessages()).toEqual(['Unable to connect to engine engine.test']);
  });

  it('should report an engine error', async () => {
    replyLogin(agent);
    reply(
      agent,
      ENGINE_URL,
      'POST',
      `${API}/jetstream/bookmark/JS_BOOKMARK-3/delete`,
      engineError('The bookmark "JS_BOOKMARK-3" is in use.', 'exception.jetstream.bookmark.in.use')
    );

    const ctx = context();
    await new SelfServiceBookmarkStep({
      engine: ENGINE,
      bookmark: 'JS_BOOKMARK-3',
      container: '',
      operation: 'Delete',
    }).perform(ctx);

    expect(ctx.log.getMessages()).toEqual(['The bookmark "JS_BOOKMARK-3" is in use.']);
  });
});

describe('SelfServiceContainerStep', () => {
  it('should refresh a container and wait for the job', async () => {
    const requests: RecordedRequest[] = [];
    replyLogin(agent);
    reply(
      agent,
      ENGINE_URL,
      'POST',
      `${API}/jetstream/container/JS_DATA_CONTAINER-1/refresh`,
      ok(null, { job: 'JOB-5' }),
      { requests }
    );
    reply(agent, ENGINE_URL, 'GET', `${API}/job/JOB-5`, job('COMPLETED', 'Refresh'));

    const ctx = context();
    await new SelfServiceContainerStep({
      engine: ENGINE,
      container: 'JS_DATA_CONTAINER-1',
      operation: 'Refresh',
    }).perform(ctx);

    expect(JSON.parse(requests[0].body)).toEqual({
      type: 'JSDataContainerRefreshParameters',
      forceOption: false,
    });
    expect(ctx.run.getPublishedReferences(ENGINE)).toEqual(['JS_DATA_CONTAINER-1', 'JOB-5']);
    expect(ctx.log.getMessages()).toEqual(['Refresh COMPLETED']);
    agent.assertNoPendingInterceptors();
  });

  it('should restore a container to a bookmark', async () => {
    const requests: RecordedRequest[] = [];
    replyLogin(agent);
    reply(
      agent,
      ENGINE_URL,
      'POST',
      `${API}/jetstream/container/JS_DATA_CONTAINER-1/restore`,
      ok(null, { job: 'JOB-5' }),
      { requests }
    );
    reply(agent, ENGINE_URL, 'GET', `${API}/job/JOB-5`, job('FAILED', 'Restore', 'Restore failed'));

    const ctx = context();
    await new SelfServiceContainerStep({
      engine: ENGINE,
      container: 'JS_DATA_CONTAINER-1',
      operation: 'Restore',
      bookmark: 'JS_BOOKMARK-2',
    }).perform(ctx);

    expect(JSON.parse(requests[0].body)).toEqual({
      type: 'JSDataContainerRestoreParameters',
      timelinePointParameters: { type: 'JSTimelinePointBookmarkInput', bookmark: 'JS_BOOKMARK-2' },
      forceOption: false,
    });
    expect(ctx.log.getMessages()).toEqual(['Restore failed']);
  });

  it('should require a bookmark to restore', async () => {
    replyLogin(agent);

    const ctx = context();
    await new SelfServiceContainerStep({
      engine: ENGINE,
      container: 'JS_DATA_CONTAINER-1',
      operation: 'Restore',
    }).perform(ctx);

    expect(ctx.log.getMessages()).toEqual(['Restore requires a bookmark']);
  });

  it('should log an undefined operation', async () => {
    replyLogin(agent);

    const ctx = context();
    await new SelfServiceContainerStep({
      engine: ENGINE,
      container: 'JS_DATA_CONTAINER-1',
      operation: 'Rollback',
    }).perform(ctx);

    expect(ctx.log.getMessages()).toEqual(['Undefined Self Service Container Operation']);
  });
});

describe('ProvisionVdbStep', () => {
  it('should provision from a bookmark, write the result and poll the job', async () => {
    const requests: RecordedRequest[] = [];
    reply(
      agent,
      DCT_URL,
      'POST',
      '/vdbs/provision_from_bookmark',
      { vdb_id: 'vdb-1', job: { id: 'job-1', status: 'STARTED' } },
      { requests }
    );
    reply(agent, DCT_URL, 'GET', '/jobs/job-1', { id: 'job-1', status: 'STARTED' });
    reply(agent, DCT_URL, 'GET', '/jobs/job-1', { id: 'job-1', status: 'COMPLETED' });

    const ctx = context();
    await new ProvisionVdbStep({
      credentialId: 'dct-key',
      provisionType: 'bookmark',
      bookmarkId: 'bookmark-1',
      name: 'ci-vdb',
      autoSelectRepository: true,
      tags: { team: 'qa' },
      outputFile: 'provision.json',
    }).perform(ctx);

    expect(JSON.parse(requests[0].body)).toEqual({
      name: 'ci-vdb',
      auto_select_repository: true,
      tags: [{ key: 'team', value: 'qa' }],
      bookmark_id: 'bookmark-1',
    });
    expect(headerValue(requests[0].headers, 'authorization')).toBe('apk test-secret');
    expect(ctx.log.getMessages()).toEqual([
      'Job job-1 submitted',
      'Current Job Status: STARTED',
      'Current Job Status: COMPLETED',
      'Job job-1 finished with status COMPLETED',
    ]);
    expect(ctx.run.getPublishedReferences(DCT_URL)).toEqual(['vdb-1', 'job-1']);

    const written = JSON.parse(await readFile(path.join(workspace, 'provision.json'), 'utf8'));
    expect(written).toEqual({ vdb_id: 'vdb-1', job: { id: 'job-1', status: 'STARTED' } });
    agent.assertNoPendingInterceptors();
  });

  it('should log the error details of a failed job', async () => {
    reply(agent, DCT_URL, 'POST', '/vdbs/provision_by_snapshot', {
      vdb_id: 'vdb-2',
      job: { id: 'job-2', status: 'STARTED' },
    });
    reply(agent, DCT_URL, 'GET', '/jobs/job-2', {
      id: 'job-2',
      status: 'FAILED',
      error_details: 'Not enough space on target',
    });

    const ctx = context();
    await new ProvisionVdbStep({
      credentialId: 'dct-key',
      provisionType: 'snapshot',
      sourceDataId: 'dsource-1',
    }).perform(ctx);

    expect(ctx.log.getMessages()).toEqual([
      'Job job-2 submitted',
      'Current Job Status: FAILED',
      'Job job-2 finished with status FAILED',
      'Not enough space on target',
    ]);
  });

  it('should return after submitting when polling is skipped', async () => {
    reply(agent, DCT_URL, 'POST', '/vdbs/provision_by_snapshot', {
      vdb_id: 'vdb-3',
      job: { id: 'job-3', status: 'STARTED' },
    });

    const ctx = context();
    await new ProvisionVdbStep({
      credentialId: 'dct-key',
      provisionType: 'snapshot',
      snapshotId: 'snapshot-1',
      skipPolling: true,
    }).perform(ctx);

    expect(ctx.log.getMessages()).toEqual(['Job job-3 submitted']);
    agent.assertNoPendingInterceptors();
  });

  it('should log an undefined provision type', async () => {
    const ctx = context();
    await new ProvisionVdbStep({ credentialId: 'dct-key', provisionType: 'clone' }).perform(ctx);

    expect(ctx.log.getMessages()).toEqual(['Undefined VDB Provision Type']);
  });

  it('should require a bookmark id', async () => {
    const ctx = context();
    await new ProvisionVdbStep({ credentialId: 'dct-key', provisionType: 'bookmark' }).perform(ctx);

    expect(ctx.log.getMessages()).toEqual(['Provisioning from a bookmark requires a bookmark id']);
  });

  it('should log a missing DCT configuration', async () => {
    const ctx = context(configuration({ dct: false }));
    await new ProvisionVdbStep({
      credentialId: 'dct-key',
      provisionType: 'bookmark',
      bookmarkId: 'bookmark-1',
    }).perform(ctx);

    expect(ctx.log.getMessages()).toEqual(['Delphix Global Configuration Missing']);
  });

  it('should log a missing credential', async () => {
    const ctx = context();
    await new ProvisionVdbStep({
      credentialId: 'prod-dct',
      provisionType: 'bookmark',
      bookmarkId: 'bookmark-1',
    }).perform(ctx);

    expect(ctx.log.getMessages()).toEqual(['Cannot find any credentials for prod-dct']);
  });

  it('should log a DCT error', async () => {
    reply(
      agent,
      DCT_URL,
      'POST',
      '/vdbs/provision_from_bookmark',
      { errors: [{ message: 'Bookmark bookmark-9 not found' }] },
      { status: 404 }
    );

    const ctx = context();
    await new ProvisionVdbStep({
      credentialId: 'dct-key',
      provisionType: 'bookmark',
      bookmarkId: 'bookmark-9',
    }).perform(ctx);

    expect(ctx.log.getMessages()).toEqual(['Bookmark bookmark-9 not found']);
    expect(ctx.run.getActions()).toEqual([]);
  });
});

describe('DeleteVdbStep', () => {
  it('should delete the VDB and poll the job', async () => {
    const requests: RecordedRequest[] = [];
    reply(agent, DCT_URL, 'POST', '/vdbs/vdb-1/delete', { job: { id: 'job-4', status: 'STARTED' } }, {
      requests,
    });
    reply(agent, DCT_URL, 'GET', '/jobs/job-4', { id: 'job-4', status: 'COMPLETED' });

    const ctx = context();
    await new DeleteVdbStep({ credentialId: 'dct-key', vdbId: 'vdb-1', force: true }).perform(ctx);

    expect(requests[0].body).toBe('{"force":true}');
    expect(ctx.log.getMessages()).toEqual([
      'Job job-4 submitted',
      'Current Job Status: COMPLETED',
      'Job job-4 finished with status COMPLETED',
    ]);
    expect(ctx.run.getPublishedReferences(DCT_URL)).toEqual(['job-4']);
  });

  it('should report a failed status fetch', async () => {
    reply(agent, DCT_URL, 'POST', '/vdbs/vdb-1/delete', { job: { id: 'job-4', status: 'STARTED' } });
    reply(agent, DCT_URL, 'GET', '/jobs/job-4', { message: 'Internal error' }, { status: 500 });

    const ctx = context();
    await new DeleteVdbStep({ credentialId: 'dct-key', vdbId: 'vdb-1' }).perform(ctx);

    expect(ctx.log.getMessages()).toEqual(['Job job-4 submitted', 'Internal error']);
  });

  it('should stop polling when the build is aborted', async () => {
    reply(agent, DCT_URL, 'POST', '/vdbs/vdb-1/delete', { job: { id: 'job-4', status: 'STARTED' } });

    const controller = new AbortController();
    controller.abort(new Error('Build aborted'));
    const ctx = { ...context(), signal: controller.signal };
    await new DeleteVdbStep({ credentialId: 'dct-key', vdbId: 'vdb-1' }).perform(ctx);

    expect(ctx.log.getMessages()).toEqual(['Job job-4 submitted', 'Wait interrupted!', 'Build aborted']);
  });

  it('should not report a running job as finished when aborted mid-wait', async () => {
    const controller = new AbortController();
    reply(agent, DCT_URL, 'POST', '/vdbs/vdb-1/delete', { job: { id: 'job-4', status: 'STARTED' } });
    reply(agent, DCT_URL, 'GET', '/jobs/job-4', { id: 'job-4', status: 'STARTED' }, {
      onRequest: () => controller.abort(new Error('Build aborted')),
    });

    const ctx = { ...context(), signal: controller.signal };
    await new DeleteVdbStep({ credentialId: 'dct-key', vdbId: 'vdb-1' }).perform(ctx);

    expect(ctx.log.getMessages()).toEqual([
      'Job job-4 submitted',
      'Current Job Status: STARTED',
      'Wait interrupted!',
      'Build aborted',
    ]);
  });
});
