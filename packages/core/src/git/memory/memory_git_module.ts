/**
 * MemoryGitModule - In-memory Git implementation for tests
 *
 * Test Helpers:
 * - setRepository(flag): toggle whether the directory is a repository
 * - listBranches(): branches created so far
 *
 * @module git/memory
 */

import type { IGitModule } from '../types';
import { BranchAlreadyExistsError, BranchNotFoundError, GitCommandError, InvalidBranchNameError } from '../errors';
import { branchNameProblem } from '../branch_name';

export type MemoryGitModuleOptions = {
  isRepository?: boolean;
  currentBranch?: string;
  branches?: string[];
};

export class MemoryGitModule implements IGitModule {
  private repository: boolean;
  private currentBranch: string;
  private readonly branches: Set<string>;

  constructor(options: MemoryGitModuleOptions = {}) {
    this.repository = options.isRepository ?? true;
    this.currentBranch = options.currentBranch ?? 'main';
    this.branches = new Set([this.currentBranch, ...(options.branches ?? [])]);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // TEST HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  setRepository(isRepository: boolean): void {
    this.repository = isRepository;
  }

  listBranches(): string[] {
    return Array.from(this.branches).sort();
  }

  // ═══════════════════════════════════════════════════════════════════════
  // IGitModule
  // ═══════════════════════════════════════════════════════════════════════

  async isRepository(): Promise<boolean> {
    return this.repository;
  }

  async getCurrentBranch(): Promise<string> {
    this.assertRepository();
    return this.currentBranch;
  }

  async branchExists(branchName: string): Promise<boolean> {
    this.assertValid(branchName);
    return this.repository && this.branches.has(branchName);
  }

  async createBranch(branchName: string): Promise<void> {
    this.assertValid(branchName);
    this.assertRepository();
    if (this.branches.has(branchName)) {
      throw new BranchAlreadyExistsError(branchName);
    }
    this.branches.add(branchName);
    this.currentBranch = branchName;
  }

  async checkoutBranch(branchName: string): Promise<void> {
    this.assertValid(branchName);
    this.assertRepository();
    if (!this.branches.has(branchName)) {
      throw new BranchNotFoundError(branchName);
    }
    this.currentBranch = branchName;
  }

  private assertRepository(): void {
    if (!this.repository) {
      throw new GitCommandError('Not in a Git repository');
    }
  }

  private assertValid(branchName: string): void {
    const problem = branchNameProblem(branchName);
    if (problem) {
      throw new InvalidBranchNameError(branchName, problem);
    }
  }
}
