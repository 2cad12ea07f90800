import { describe, it, expect, vi } from 'vitest';
import { PushRunner, silentReporter, failedStep, type StepReporter } from './push-runner.js';
import { FakeGit } from '../testing/fake-git.js';

describe('PushRunner', () => {
  it('stages, commits and pushes an untracked file', async () => {
    const git = new FakeGit();
    git.writeFile('notes.txt', 'hello');
    const runner = new PushRunner(git, silentReporter);

    const result = await runner.run('Add notes');

    expect(git.calls).toEqual(['add', 'commit', 'push']);
    expect(result.steps.map((s) => s.ok)).toEqual([true, true, true]);
    expect(git.commits).toHaveLength(1);
    expect(git.commits[0]?.message).toBe('Add notes');
    expect(git.commits[0]?.tree.get('notes.txt')).toBe('hello');
    expect(git.remoteCommits).toEqual([git.commits[0]?.hash]);
    expect(result.commit).toBe(git.commits[0]?.hash);
  });

  it('still pushes when there is nothing to commit', async () => {
    const git = new FakeGit();
    const runner = new PushRunner(git, silentReporter);

    const result = await runner.run('Nothing here');

    expect(git.calls).toEqual(['add', 'commit', 'push']);
    expect(result.steps[1]).toMatchObject({
      step: 'commit',
      ok: false,
      error: 'nothing to commit',
    });
    expect(result.steps[2]).toMatchObject({ step: 'push', ok: true });
    expect(result.commit).toBe('');
  });

  it('creates a single commit across two runs with no changes in between', async () => {
    const git = new FakeGit();
    git.writeFile('a.txt', '1');
    const runner = new PushRunner(git, silentReporter);

    await runner.run('First');
    await runner.run('First');

    expect(git.commits).toHaveLength(1);
    expect(git.calls).toEqual(['add', 'commit', 'push', 'add', 'commit', 'push']);
  });

  it('keeps the local commit when the remote rejects the push', async () => {
    const git = new FakeGit();
    git.writeFile('a.txt', '1');
    git.rejectPush = true;
    const runner = new PushRunner(git, silentReporter);

    const result = await runner.run('Diverged');

    expect(git.commits).toHaveLength(1);
    expect(git.remoteCommits).toEqual([]);
    expect(failedStep(result)).toMatchObject({
      step: 'push',
      error: '! [rejected] main -> main (non-fast-forward)',
    });
  });

  it('passes the message through byte for byte', async () => {
    const git = new FakeGit();
    git.writeFile('a.txt', '1');
    const message = `Fix "quotes" & $HOME \`ticks\` 'single'\nsecond line ✓`;

    await new PushRunner(git, silentReporter).run(message);

    expect(git.commits[0]?.message).toBe(message);
  });

  it('continues past a failing git add', async () => {
    const git = new FakeGit();
    git.failOn.add = 'fatal: Unable to create index.lock';
    const result = await new PushRunner(git, silentReporter).run('Update');

    expect(git.calls).toEqual(['add', 'commit', 'push']);
    expect(result.steps.map((s) => s.ok)).toEqual([false, false, true]);
  });

  it('stops at the first failure when asked to', async () => {
    const git = new FakeGit();
    git.failOn.add = 'fatal: Unable to create index.lock';
    const result = await new PushRunner(git, silentReporter).run('Update', { stopOnFailure: true });

    expect(git.calls).toEqual(['add']);
    expect(result.steps).toHaveLength(1);
    expect(result.commit).toBeUndefined();
  });

  it('pushes to an explicit target with upstream tracking', async () => {
    const git = new FakeGit({ upstream: false });
    git.writeFile('a.txt', '1');
    const runner = new PushRunner(git, silentReporter);

    const result = await runner.run('Track', { target: { remote: 'origin', branch: 'main' } });

    expect(git.calls[2]).toBe('push origin main');
    expect(result.steps[2]?.command).toBe('git push -u origin main');
    expect(git.upstream).toBe(true);
  });

  it('reports a missing upstream without throwing', async () => {
    const git = new FakeGit({ upstream: false });
    git.writeFile('a.txt', '1');

    const result = await new PushRunner(git, silentReporter).run('No upstream');

    expect(result.steps[2]).toMatchObject({
      ok: false,
      error: 'fatal: The current branch main has no upstream branch.',
    });
  });

  it('announces each command before running it', async () => {
    const git = new FakeGit();
    const reporter: StepReporter = { stepStarted: vi.fn(), stepFinished: vi.fn() };

    await new PushRunner(git, reporter).run('Say "hi"');

    expect(vi.mocked(reporter.stepStarted).mock.calls).toEqual([
      ['add', 'git add .'],
      ['commit', 'git commit -m "Say \\"hi\\""'],
      ['push', 'git push'],
    ]);
    expect(reporter.stepFinished).toHaveBeenCalledTimes(3);
  });
});
