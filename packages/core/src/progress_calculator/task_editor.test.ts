import { setTaskStatus } from './task_editor';
import { TaskEditError } from './progress_calculator.errors';

describe('setTaskStatus', () => {
  describe('list tasks', () => {
    it('should swap the status bracket of the matching line only', () => {
      const edit = setTaskStatus('- [ ] T001: Schema\n- [ ] T002: API', 'T002', 'done');

      expect(edit).toEqual({
        document: '- [ ] T001: Schema\n- [x] T002: API',
        previous: 'pending',
        line: 2,
      });
    });

    it('should edit a marker written after the id', () => {
      const edit = setTaskStatus('- T001 [>] Wire it up', 'T001', 'blocked');

      expect(edit?.document).toBe('- T001 [!] Wire it up');
      expect(edit?.previous).toBe('in-progress');
    });

    it('should leave tags in front of the marker untouched', () => {
      const edit = setTaskStatus('- [P] [ ] T003: Parallel work', 'T003', 'in-progress');

      expect(edit?.document).toBe('- [P] [>] T003: Parallel work');
    });

    it('should keep CRLF line endings', () => {
      const edit = setTaskStatus('- [ ] T001\r\n- [ ] T002\r\n', 'T001', 'done');

      expect(edit?.document).toBe('- [x] T001\r\n- [ ] T002\r\n');
    });

    it('should return the document unchanged when the status already matches', () => {
      const document = '- [x] T001: Done already';

      expect(setTaskStatus(document, 'T001', 'done')).toEqual({ document, previous: 'done', line: 1 });
    });

    it('should return null for an unknown id', () => {
      expect(setTaskStatus('- [ ] T001', 'T999', 'done')).toBeNull();
    });

    it('should not edit a detail bullet that repeats the id', () => {
      const document = '- [ ] T001: Schema\n\n## Details\n- **T001**: Use [ ] for open items';

      expect(setTaskStatus(document, 'T001', 'done')?.document).toBe(
        '- [x] T001: Schema\n\n## Details\n- **T001**: Use [ ] for open items'
      );
    });
  });

  describe('yaml tasks', () => {
    it('should replace the status value inside a fenced block', () => {
      const document = [
        '# Tasks',
        '',
        '```yaml',
        '- id: T001',
        '  title: Schema',
        '  status: todo',
        '- id: T002',
        '  status: in-progress',
        '```',
        '',
      ].join('\n');

      const edit = setTaskStatus(document, 'T002', 'done');

      expect(edit?.previous).toBe('in-progress');
      expect(edit?.line).toBe(8);
      expect(edit?.document).toBe(document.replace('  status: in-progress', '  status: done'));
    });

    it('should add a status key under the id when there is none', () => {
      const edit = setTaskStatus('---\nid: T010\ntitle: Docs\n---\n# Body', 'T010', 'done');

      expect(edit).toEqual({
        document: '---\nid: T010\nstatus: done\ntitle: Docs\n---\n# Body',
        previous: 'pending',
        line: 3,
      });
    });

    it('should refuse a flow mapping it cannot edit in place', () => {
      const document = '```yaml\n- {id: T001, status: todo}\n```';

      expect(() => setTaskStatus(document, 'T001', 'done')).toThrow(TaskEditError);
      expect(() => setTaskStatus(document, 'T001', 'done')).toThrow(
        'Cannot update T001: no "id: T001" line found in the YAML block on line 1'
      );
    });
  });
});
