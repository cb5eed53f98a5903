import { mkdirSync, existsSync, rmSync } from 'fs';
import { join, resolve } from 'path';
import { GitRunner } from '../../src/services/git.js';

export const MAIN_HEAD = 'a'.repeat(40);
export const OLD_COMMIT = 'b'.repeat(40);

interface FakeWorktree {
  branch: string;
  head: string;
}

/**
 * In-process stand-in for the git CLI. Worktree directories are really
 * created and removed on disk so existence checks behave as with git.
 */
export class FakeGit {
  readonly calls: string[][] = [];
  readonly worktrees = new Map<string, FakeWorktree>();
  readonly branches = new Set<string>(['main']);
  readonly commits = new Set<string>([MAIN_HEAD, OLD_COMMIT]);
  failFetch = false;

  constructor(readonly repoPath: string) {}

  readonly run: GitRunner = async (args) => {
    this.calls.push(args);
    const [command, ...rest] = args;

    switch (command) {
      case 'clone': {
        mkdirSync(join(rest[1] ?? '', '.git'), { recursive: true });
        return '';
      }
      case 'symbolic-ref':
        return 'refs/remotes/origin/main\n';
      case 'show-ref':
        if (this.branches.has((rest[2] ?? '').replace('refs/heads/', ''))) return '';
        throw new Error('not a ref');
      case 'fetch':
        if (this.failFetch) throw new Error('fatal: could not read from remote repository');
        return '';
      case 'rev-parse':
        return this.revParse(rest);
      case 'worktree':
        return this.worktree(rest);
      case 'branch':
        return this.branch(rest);
      default:
        throw new Error(`unexpected git ${args.join(' ')}`);
    }
  };

  wasCalledWith(...args: string[]): boolean {
    return this.calls.some((call) => call.join(' ') === args.join(' '));
  }

  private revParse(args: string[]): string {
    if (args[0] === '--verify') {
      const wanted = (args[2] ?? '').replace('^{commit}', '').toLowerCase();
      const found = Array.from(this.commits).find((commit) => commit.startsWith(wanted));
      if (!found) throw new Error(`fatal: Needed a single revision`);
      return `${found}\n`;
    }
    return `${MAIN_HEAD}\n`;
  }

  private worktree(args: string[]): string {
    const [sub, ...rest] = args;
    if (sub === 'list') {
      let out = `worktree ${this.repoPath}\nHEAD ${MAIN_HEAD}\nbranch refs/heads/main\n\n`;
      for (const [path, worktree] of this.worktrees) {
        out += `worktree ${path}\nHEAD ${worktree.head}\nbranch refs/heads/${worktree.branch}\n\n`;
      }
      return out;
    }
    if (sub === 'add') {
      // add -B <branch> <path> <commit>
      const [, branch = '', path = '', head = ''] = rest;
      const target = resolve(path);
      if (existsSync(target)) throw new Error(`fatal: '${path}' already exists`);
      mkdirSync(target, { recursive: true });
      this.worktrees.set(target, { branch, head });
      this.branches.add(branch);
      return '';
    }
    if (sub === 'remove') {
      const target = resolve(rest[1] ?? '');
      if (!this.worktrees.has(target)) throw new Error(`fatal: '${target}' is not a working tree`);
      this.worktrees.delete(target);
      rmSync(target, { recursive: true, force: true });
      return '';
    }
    if (sub === 'prune') {
      for (const path of Array.from(this.worktrees.keys())) {
        if (!existsSync(path)) this.worktrees.delete(path);
      }
      return '';
    }
    throw new Error(`unexpected git worktree ${args.join(' ')}`);
  }

  private branch(args: string[]): string {
    if (args[0] === '--merged') {
      // every debug branch sits on a commit already contained in main
      return Array.from(this.branches).map((branch) => `${branch}\n`).join('');
    }
    if (args[0] === '-D') {
      const name = args[1] ?? '';
      const checkedOut = Array.from(this.worktrees.values()).some((worktree) => worktree.branch === name);
      if (checkedOut) throw new Error(`error: cannot delete branch '${name}' checked out`);
      this.branches.delete(name);
      return '';
    }
    throw new Error(`unexpected git branch ${args.join(' ')}`);
  }
}
