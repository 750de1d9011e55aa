import { MemoryGitModule } from './memory_git_module';
import { BranchAlreadyExistsError, BranchNotFoundError, GitCommandError } from '../errors';

describe('MemoryGitModule', () => {
  it('should create and switch branches', async () => {
    const git = new MemoryGitModule();

    await git.createBranch('001-user-auth');

    expect(await git.getCurrentBranch()).toBe('001-user-auth');
    expect(git.listBranches()).toEqual(['001-user-auth', 'main']);
    await expect(git.createBranch('001-user-auth')).rejects.toBeInstanceOf(BranchAlreadyExistsError);
  });

  it('should refuse to check out unknown branches', async () => {
    const git = new MemoryGitModule({ branches: ['002-billing'] });

    await git.checkoutBranch('002-billing');
    expect(await git.getCurrentBranch()).toBe('002-billing');
    await expect(git.checkoutBranch('003-x')).rejects.toBeInstanceOf(BranchNotFoundError);
  });

  it('should behave like a plain directory when not a repository', async () => {
    const git = new MemoryGitModule({ isRepository: false });

    expect(await git.isRepository()).toBe(false);
    expect(await git.branchExists('main')).toBe(false);
    await expect(git.createBranch('001-x')).rejects.toBeInstanceOf(GitCommandError);
  });
});
