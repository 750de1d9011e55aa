import { branchNameProblem } from './branch_name';

describe('branchNameProblem', () => {
  it('should accept feature branch names', () => {
    expect(branchNameProblem('001-user-auth')).toBeNull();
    expect(branchNameProblem('feature/1042-export')).toBeNull();
  });

  it('should explain what is wrong', () => {
    expect(branchNameProblem('')).toBe('name is empty');
    expect(branchNameProblem('-x')).toBe('name starts with "-"');
    expect(branchNameProblem('a b')).toBe('name contains whitespace or a reserved character');
    expect(branchNameProblem('a..b')).toBe('name contains ".."');
    expect(branchNameProblem('a@{1}')).toBe('name contains "@{"');
    expect(branchNameProblem('a//b')).toBe('name contains "//"');
    expect(branchNameProblem('a/')).toBe('name starts or ends with "/"');
    expect(branchNameProblem('a.lock')).toBe('name ends with "." or ".lock"');
  });
});
