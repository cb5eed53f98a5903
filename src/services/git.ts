import { execFile } from 'child_process';
import { promisify } from 'util';
import { existsSync } from 'fs';
import { copyFile, mkdir, rm } from 'fs/promises';
import { dirname, join, resolve } from 'path';
import { branchNameFor } from '../types.js';
import { OrchestratorError, errorMessage } from '../errors.js';

const execFileAsync = promisify(execFile);

/**
 * Runs `git <args>` and resolves with stdout; rejects on a non-zero exit.
 */
export type GitRunner = (args: string[], options?: { cwd?: string }) => Promise<string>;

export interface GitRunnerOptions {
  repoPath: string;
  sshKeyPath?: string;
  timeoutMs?: number;
}

export function createGitRunner(options: GitRunnerOptions): GitRunner {
  const env: NodeJS.ProcessEnv = { ...process.env };
  if (options.sshKeyPath) {
    env.GIT_SSH_COMMAND = `ssh -i "${options.sshKeyPath}" -o IdentitiesOnly=yes -o StrictHostKeyChecking=accept-new`;
  }

  return async (args, runOptions) => {
    const { stdout } = await execFileAsync('git', args, {
      cwd: runOptions?.cwd ?? options.repoPath,
      env,
      timeout: options.timeoutMs ?? 120_000,
      maxBuffer: 10 * 1024 * 1024,
    });
    return stdout;
  };
}

export interface RegisteredWorktree {
  path: string;
  branch?: string;
  head?: string;
}

export interface CreatedWorkingCopy {
  path: string;
  branch: string;
  commit: string;
}

export interface SweepResult {
  removedWorktrees: number;
  prunedBranches: number;
}

export interface WorktreeServiceConfig {
  projectPath: string;
  baseDir: string;
  envTemplate: string;
  mainBranch?: string;
  repoUrl?: string;
  git: GitRunner;
}

/**
 * Manages the isolated working copies (git worktrees) that back debug instances.
 */
export class WorktreeService {
  private readonly projectPath: string;
  private readonly baseDir: string;
  private readonly envTemplate: string;
  private readonly repoUrl?: string;
  private readonly git: GitRunner;
  private mainBranch?: string;

  constructor(config: WorktreeServiceConfig) {
    this.projectPath = resolve(config.projectPath);
    this.baseDir = resolve(config.baseDir);
    this.envTemplate = config.envTemplate;
    this.repoUrl = config.repoUrl;
    this.mainBranch = config.mainBranch;
    this.git = config.git;
  }

  getBaseDir(): string {
    return this.baseDir;
  }

  pathFor(correlationId: string): string {
    return join(this.baseDir, correlationId);
  }

  async ensureRepository(): Promise<void> {
    if (existsSync(join(this.projectPath, '.git'))) {
      return;
    }

    if (!this.repoUrl) {
      throw new Error(`${this.projectPath} is not a git repository and REPO_URL is not set`);
    }

    console.log(`[Worktrees] Cloning ${this.repoUrl} into ${this.projectPath}`);
    await mkdir(dirname(this.projectPath), { recursive: true });
    await this.git(['clone', this.repoUrl, this.projectPath], { cwd: dirname(this.projectPath) });
    console.log('[Worktrees] Repository cloned');
  }

  async detectMainBranch(): Promise<string> {
    if (this.mainBranch) {
      return this.mainBranch;
    }

    // First try to get the default branch from the remote
    try {
      const defaultBranch = await this.git(['symbolic-ref', 'refs/remotes/origin/HEAD']);
      const branch = defaultBranch.trim().replace('refs/remotes/origin/', '');
      if (branch) {
        this.mainBranch = branch;
        return branch;
      }
    } catch {
      // no origin/HEAD, look at local branches
    }

    for (const name of ['main', 'master']) {
      try {
        await this.git(['show-ref', '--verify', '--quiet', `refs/heads/${name}`]);
        this.mainBranch = name;
        return name;
      } catch {
        continue;
      }
    }

    return 'main';
  }

  async resolveHead(): Promise<string> {
    const head = await this.git(['rev-parse', 'HEAD']);
    return head.trim();
  }

  /**
   * Latest known upstream commit of the main branch, used to tell whether the
   * debugged commit is already behind.
   */
  async fetchReferenceCommit(): Promise<string> {
    const main = await this.detectMainBranch();

    try {
      await this.git(['fetch', 'origin', main]);
      const remote = await this.git(['rev-parse', `origin/${main}`]);
      return remote.trim();
    } catch (error) {
      console.warn(`[Worktrees] Could not fetch origin/${main}, using local ${main}: ${errorMessage(error)}`);
    }

    try {
      const local = await this.git(['rev-parse', main]);
      return local.trim();
    } catch {
      return this.resolveHead();
    }
  }

  async verifyCommit(commit: string): Promise<string> {
    try {
      const sha = await this.git(['rev-parse', '--verify', '--quiet', `${commit}^{commit}`]);
      return sha.trim();
    } catch {
      // not available locally, it may only exist on the remote
    }

    try {
      await this.git(['fetch', 'origin', commit]);
      const sha = await this.git(['rev-parse', '--verify', '--quiet', `${commit}^{commit}`]);
      return sha.trim();
    } catch (error) {
      throw new OrchestratorError('CommitNotFound', `Commit ${commit} could not be resolved`, { cause: error });
    }
  }

  async listWorktrees(): Promise<RegisteredWorktree[]> {
    const stdout = await this.git(['worktree', 'list', '--porcelain']);
    const worktrees: RegisteredWorktree[] = [];
    let current: RegisteredWorktree | null = null;
    let isFirstWorktree = true; // The first entry is always the main working tree

    const flush = () => {
      if (current && !isFirstWorktree) {
        worktrees.push(current);
      }
      if (current) {
        isFirstWorktree = false;
      }
      current = null;
    };

    for (const line of stdout.split('\n')) {
      if (line.startsWith('worktree ')) {
        flush();
        current = { path: line.substring(9) };
      } else if (current && line.startsWith('branch ')) {
        current.branch = line.substring(7).replace(/^refs\/heads\//, '');
      } else if (current && line.startsWith('HEAD ')) {
        current.head = line.substring(5);
      }
    }
    flush();

    return worktrees;
  }

  async exists(correlationId: string): Promise<boolean> {
    const path = this.pathFor(correlationId);
    if (!existsSync(path)) {
      return false;
    }
    const worktrees = await this.listWorktrees();
    return worktrees.some((worktree) => resolve(worktree.path) === path);
  }

  async create(correlationId: string, sourceCommit: string): Promise<CreatedWorkingCopy> {
    const path = this.pathFor(correlationId);
    const branch = branchNameFor(correlationId);
    const commit = await this.verifyCommit(sourceCommit);

    const registered = (await this.listWorktrees()).find((worktree) => resolve(worktree.path) === path);
    if (existsSync(path)) {
      throw new OrchestratorError('AlreadyExists', `Working copy ${path} already exists`);
    }
    if (registered) {
      // Registration without a directory is stale
      await this.git(['worktree', 'prune']);
    }

    await mkdir(this.baseDir, { recursive: true });

    try {
      // -B reuses debug/<id> if an earlier instance left it behind
      await this.git(['worktree', 'add', '-B', branch, path, commit]);
    } catch (error) {
      throw new Error(`Failed to create worktree for ${correlationId}: ${errorMessage(error)}`, { cause: error });
    }

    await this.copyEnvTemplate(path);

    console.log(`[Worktrees] Created ${path} on ${branch} at ${commit}`);
    return { path, branch, commit };
  }

  /**
   * Removes the working copy of an instance. A directory that is already gone
   * is logged, not treated as an error.
   */
  async remove(correlationId: string): Promise<boolean> {
    const path = this.pathFor(correlationId);
    const registered = (await this.listWorktrees()).some((worktree) => resolve(worktree.path) === path);
    const present = existsSync(path);

    if (!registered && !present) {
      console.log(`[Worktrees] Working copy for ${correlationId} already removed`);
      return false;
    }

    if (registered) {
      try {
        await this.git(['worktree', 'remove', '--force', path]);
      } catch (error) {
        console.warn(`[Worktrees] git worktree remove failed for ${path}: ${errorMessage(error)}`);
      }
    }

    if (existsSync(path)) {
      await rm(path, { recursive: true, force: true });
    }

    await this.git(['worktree', 'prune']);
    console.log(`[Worktrees] Removed working copy ${path}`);
    return true;
  }

  /**
   * Deregisters worktrees whose directory vanished, then deletes merged
   * debug branches that no remaining worktree has checked out. The order
   * matters: a branch is only considered once its worktree is gone.
   */
  async sweepOrphans(): Promise<SweepResult> {
    let removedWorktrees = 0;
    for (const worktree of await this.listWorktrees()) {
      if (existsSync(worktree.path)) continue;

      console.log(`[Worktrees] Removing orphaned worktree ${worktree.path}`);
      try {
        await this.git(['worktree', 'remove', '--force', worktree.path]);
      } catch (error) {
        console.warn(`[Worktrees] remove failed for ${worktree.path}, relying on prune: ${errorMessage(error)}`);
      }
      removedWorktrees++;
    }

    if (removedWorktrees > 0) {
      await this.git(['worktree', 'prune']);
    }

    const main = await this.detectMainBranch();
    const checkedOut = new Set(
      (await this.listWorktrees())
        .map((worktree) => worktree.branch)
        .filter((branch): branch is string => Boolean(branch))
    );
    const merged = await this.git(['branch', '--merged', main, '--format=%(refname:short)']);

    let prunedBranches = 0;
    for (const branch of merged.split('\n').map((line) => line.trim())) {
      if (!branch.startsWith('debug/') || checkedOut.has(branch)) continue;

      try {
        await this.git(['branch', '-D', branch]);
        prunedBranches++;
        console.log(`[Worktrees] Deleted merged branch ${branch}`);
      } catch (error) {
        console.warn(`[Worktrees] Could not delete branch ${branch}: ${errorMessage(error)}`);
      }
    }

    return { removedWorktrees, prunedBranches };
  }

  private async copyEnvTemplate(worktreePath: string): Promise<void> {
    const template = join(this.projectPath, this.envTemplate);
    if (!existsSync(template)) {
      console.warn(`[Worktrees] Environment template ${template} not found, skipping .env`);
      return;
    }
    await copyFile(template, join(worktreePath, '.env'));
  }
}
