import fs from 'fs';
import os from 'os';
import path from 'path';
import { ExitCode } from '@graphrun/engine';
import { runGraph } from '../src/commands/run.js';
import { resumeGraph } from '../src/commands/resume.js';
import { validateGraphs } from '../src/commands/validate.js';
import { HumanFormatter } from '../src/formatters/HumanFormatter.js';
import { JsonFormatter } from '../src/formatters/JsonFormatter.js';
import type { FormatterOutput } from '../src/formatters/Formatter.js';
import type { CliRunOptions } from '../src/types/CliRunOptions.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Collects formatter lines instead of writing to the terminal
 */
class RecordingOutput implements FormatterOutput {
  readonly lines: string[] = [];
  readonly errors: string[] = [];

  out(line: string): void {
    this.lines.push(line);
  }

  err(line: string): void {
    this.errors.push(line);
  }

  records(): Array<Record<string, unknown>> {
    return this.lines.map(line => {
      const parsed: unknown = JSON.parse(line);
      if (!isRecord(parsed)) {
        throw new Error(`Not a JSON object: ${line}`);
      }
      return parsed;
    });
  }

  last(): Record<string, unknown> {
    const records = this.records();
    return records[records.length - 1];
  }
}

const linearGraph = {
  name: 'linear',
  nodes: [
    { id: 'draft', nodeType: 'model', outputKeys: ['text'] },
    { id: 'done', nodeType: 'terminal-pass' },
  ],
  edges: [{ source: 'draft', target: 'done', condition: 'on_success' }],
  terminalNodes: ['done'],
};

const cycleGraph = {
  name: 'cycle',
  nodes: [
    { id: 'a', nodeType: 'terminal-pass' },
    { id: 'b', nodeType: 'terminal-pass' },
  ],
  edges: [
    { source: 'a', target: 'b' },
    { source: 'b', target: 'a' },
  ],
};

const approvalGraph = {
  name: 'approval',
  nodes: [
    { id: 'draft', nodeType: 'model', outputKeys: ['draft'] },
    {
      id: 'review',
      nodeType: 'conditional',
      inputKeys: ['approved'],
      outputKeys: ['decision'],
      rules: [{ when: 'approved', output: { decision: 'publish' } }],
      otherwise: { decision: 'revise' },
    },
    { id: 'publish', nodeType: 'terminal-pass' },
  ],
  edges: [
    { source: 'draft', target: 'review', condition: 'on_success' },
    { source: 'review', target: 'publish', condition: 'on_success' },
  ],
  pauseNodes: ['review'],
  terminalNodes: ['publish'],
};

const danglingGraph = {
  name: 'dangling',
  nodes: [{ id: 'a', nodeType: 'terminal-pass' }],
  edges: [{ source: 'a', target: 'missing' }],
};

describe('CLI commands', () => {
  let dir: string;
  let output: RecordingOutput;

  function writeFile(name: string, content: unknown): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, typeof content === 'string' ? content : JSON.stringify(content));
    return file;
  }

  function options(overrides: Partial<CliRunOptions> = {}): CliRunOptions {
    return { stateDir: path.join(dir, 'state'), ...overrides };
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'graphrun-cli-'));
    output = new RecordingOutput();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('validate', () => {
    it('reports a valid graph', async () => {
      const file = writeFile('linear.json', linearGraph);

      const code = await validateGraphs([file], new JsonFormatter({ output }));

      expect(code).toBe(ExitCode.SUCCESS);
      expect(output.records()).toEqual([{ type: 'graph.validation', graph: 'linear', valid: true, errors: [] }]);
    });

    it('reports structural errors', async () => {
      const valid = writeFile('linear.json', linearGraph);
      const broken = writeFile('dangling.json', danglingGraph);

      const code = await validateGraphs([broken, valid], new JsonFormatter({ output }));

      expect(code).toBe(ExitCode.INVALID_GRAPH);
      const [report] = output.records();
      expect(report.valid).toBe(false);
      expect(report.errors).toEqual([
        expect.objectContaining({
          code: 'GR-S-004',
          message: 'Edge "e1" target "missing" is not a declared node',
          path: 'edges[0].target',
        }),
      ]);
      expect(output.lines).toHaveLength(2);
    });

    it('fails on unreadable files and empty path lists', async () => {
      expect(await validateGraphs([path.join(dir, 'absent.yaml')], new JsonFormatter({ output }))).toBe(
        ExitCode.INVALID_GRAPH
      );
      expect(await validateGraphs([], new JsonFormatter({ output }))).toBe(ExitCode.INVALID_GRAPH);
      expect(output.errors).toHaveLength(2);
    });

    it('prints a valid graph in human form', async () => {
      const file = writeFile('linear.json', linearGraph);

      await validateGraphs([file], new HumanFormatter({ output, noColor: true }));

      expect(output.lines).toEqual(['✔ linear is valid']);
    });
  });

  describe('run', () => {
    it('streams events and the result as JSON lines', async () => {
      const file = writeFile('linear.json', linearGraph);

      const code = await runGraph(file, options({ runId: 'r-1' }), new JsonFormatter({ output }));

      expect(code).toBe(ExitCode.SUCCESS);
      expect(output.records().map(record => record.type)).toEqual([
        'run.started',
        'node.started',
        'node.completed',
        'node.started',
        'node.completed',
        'run.succeeded',
        'run.result',
      ]);
      expect(output.last()).toMatchObject({
        runId: 'r-1',
        status: 'Succeeded',
        mock: true,
        goalRef: 'cli',
        stepsExecuted: 2,
        path: ['draft', 'done'],
        output: { text: '<mock:draft.text>' },
      });
    });

    it('renders a human summary', async () => {
      const file = writeFile('linear.json', linearGraph);

      await runGraph(file, options({ runId: 'r-h' }), new HumanFormatter({ output, noColor: true }));

      expect(output.lines).toEqual(
        expect.arrayContaining([
          '▶ linear@1.0.0 [mock]',
          '● draft (model, step 1)',
          '● done (terminal-pass, step 2)',
          '✔ Run succeeded',
          '  mock run: model and tool nodes were not called',
          '  Run:      r-h',
          '  Steps:    2',
          '  Path:     draft → done',
          '  text = <mock:draft.text>',
        ])
      );
    });

    it('exits with the budget code when the step budget runs out', async () => {
      const file = writeFile('cycle.json', cycleGraph);

      const code = await runGraph(file, options({ maxSteps: 3 }), new JsonFormatter({ output }));

      expect(code).toBe(ExitCode.BUDGET_EXCEEDED);
      expect(output.last()).toMatchObject({
        status: 'BudgetExceeded',
        stepsExecuted: 3,
        error: { kind: 'BudgetExceeded', nodeId: 'b' },
      });
    });

    it('plays scripted outcomes', async () => {
      const file = writeFile('linear.json', linearGraph);
      const outcomes = writeFile('outcomes.yaml', 'draft:\n  - status: failure\n    kind: Timeout\n');

      const code = await runGraph(file, options({ outcomes }), new JsonFormatter({ output }));

      expect(code).toBe(ExitCode.RUN_FAILED);
      expect(output.last()).toMatchObject({
        status: 'Failed',
        error: { kind: 'NoMatchingEdge', nodeId: 'draft' },
      });
    });

    it('rejects an outcomes file of the wrong shape', async () => {
      const file = writeFile('linear.json', linearGraph);
      const outcomes = writeFile('outcomes.json', { draft: [{ status: 'maybe' }] });

      const code = await runGraph(file, options({ outcomes }), new JsonFormatter({ output }));

      expect(code).toBe(ExitCode.INVALID_CONFIG);
      expect(output.lines).toEqual([]);
      expect(JSON.parse(output.errors[0])).toMatchObject({ type: 'error', error: { code: 'GR-C-001' } });
    });

    it('refuses an invalid graph', async () => {
      const file = writeFile('dangling.json', danglingGraph);

      const code = await runGraph(file, options(), new JsonFormatter({ output }));

      expect(code).toBe(ExitCode.INVALID_GRAPH);
      expect(output.lines).toEqual([]);
    });
  });

  describe('resume', () => {
    it('continues a paused run from the state directory', async () => {
      const file = writeFile('approval.json', approvalGraph);
      const stateFile = path.join(dir, 'state', 'r-approval.json');

      const paused = await runGraph(file, options({ runId: 'r-approval' }), new JsonFormatter({ output }));

      expect(paused).toBe(ExitCode.SUCCESS);
      expect(output.last()).toMatchObject({ status: 'Paused', pausedAt: 'review', stepsExecuted: 1 });
      expect(fs.existsSync(stateFile)).toBe(true);

      const resumedOutput = new RecordingOutput();
      const resumed = await resumeGraph(
        'r-approval',
        file,
        options({ set: ['approved=true'] }),
        new JsonFormatter({ output: resumedOutput })
      );

      expect(resumed).toBe(ExitCode.SUCCESS);
      expect(resumedOutput.records()[0].type).toBe('run.resumed');
      expect(resumedOutput.last()).toMatchObject({
        status: 'Succeeded',
        stepsExecuted: 3,
        path: ['draft', 'review', 'publish'],
        output: { draft: '<mock:draft.draft>', approved: true, decision: 'publish' },
      });
      expect(fs.existsSync(stateFile)).toBe(false);
    });

    it('fails when no paused run is stored', async () => {
      const file = writeFile('approval.json', approvalGraph);

      const code = await resumeGraph('r-unknown', file, options(), new JsonFormatter({ output }));

      expect(code).toBe(ExitCode.INVALID_CONFIG);
      expect(JSON.parse(output.errors[0])).toMatchObject({ error: { code: 'GR-C-005' } });
    });

    it('shows how to resume a paused run', async () => {
      const file = writeFile('approval.json', approvalGraph);

      await runGraph(file, options({ runId: 'r-approval' }), new HumanFormatter({ output, noColor: true }));

      expect(output.lines).toContain('⏸ Run paused at review');
      expect(output.lines).toContain('Resume with: graphrun resume r-approval <graph>');
    });
  });
});
