import { describe, it, expect } from 'vitest';
import { cellsToIpynb, ipynbToCells, ipynbToSource, sourceToIpynb } from '../ipynbConverter';
import { MalformedInputError } from '../errors';
import { parseNotebook, serializeNotebook } from '../parser';

const SOURCE = `# Databricks notebook source
print(1)

# COMMAND ----------

# MAGIC %md
# MAGIC # Title
# MAGIC
# MAGIC Some text

# COMMAND ----------

# MAGIC %sql
# MAGIC SELECT 1

# COMMAND ----------

# MAGIC %pip install requests`;

describe('cellsToIpynb', () => {
  it('converts simple notebook to nbformat 4 cells', () => {
    const ipynb = cellsToIpynb(parseNotebook(SOURCE));

    expect(ipynb.nbformat).toBe(4);
    expect(ipynb.nbformat_minor).toBe(5);
    expect(ipynb.cells).toHaveLength(4);
    expect(ipynb.cells[0]).toEqual({
      cell_type: 'code',
      source: ['print(1)'],
      metadata: {},
      execution_count: null,
      outputs: [],
    });
  });

  it('converts markdown cells without magic prefixes', () => {
    const ipynb = cellsToIpynb(parseNotebook(SOURCE));

    expect(ipynb.cells[1]).toEqual({
      cell_type: 'markdown',
      source: ['# Title\n', '\n', 'Some text'],
      metadata: { databricks_language: 'md' },
    });
  });

  it('converts SQL cells with %%sql magic for kernel execution', () => {
    const ipynb = cellsToIpynb(parseNotebook(SOURCE));

    expect(ipynb.cells[2]?.source).toEqual(['%%sql\n', 'SELECT 1']);
    expect(ipynb.cells[2]?.metadata).toEqual({ databricks_language: 'sql' });
  });

  it('keeps line magics such as %pip in the cell', () => {
    const ipynb = cellsToIpynb(parseNotebook(SOURCE));
    expect(ipynb.cells[3]?.source).toEqual(['%pip install requests']);
  });

  it('converts R cells with %%R and drops a bare %python directive', () => {
    const ipynb = cellsToIpynb(
      parseNotebook('# MAGIC %r\n# MAGIC summary(df)\n# COMMAND ----------\n# MAGIC %python\n# MAGIC x = 1')
    );

    expect(ipynb.cells[0]?.source).toEqual(['%%R\n', 'summary(df)']);
    expect(ipynb.cells[1]?.source).toEqual(['x = 1']);
  });

  it('converts an empty cell to an empty source', () => {
    expect(cellsToIpynb(parseNotebook('')).cells[0]?.source).toEqual([]);
  });
});

describe('ipynbToCells', () => {
  it('converts %%bash cells to shell magic cells', () => {
    const result = ipynbToCells({ cells: [{ cell_type: 'code', source: ['%%bash\n', 'ls -la'] }] });
    expect(result).toEqual([{ index: 0, content: '# MAGIC %sh\n# MAGIC ls -la', language: 'sh' }]);
  });

  it('strips %%python and keeps plain code', () => {
    const result = ipynbToCells({ cells: [{ cell_type: 'code', source: '%%python\nx = 1\n' }] });
    expect(result).toEqual([{ index: 0, content: 'x = 1', language: null }]);
  });

  it('wraps markdown cells as %md magic', () => {
    const result = ipynbToCells({ cells: [{ cell_type: 'markdown', source: ['# Hi\n', '\n', 'there'] }] });
    expect(result).toEqual([
      { index: 0, content: '# MAGIC %md\n# MAGIC # Hi\n# MAGIC\n# MAGIC there', language: 'md' },
    ]);
  });

  it('uses stored language when the magic is missing', () => {
    const result = ipynbToCells({
      cells: [{ cell_type: 'code', source: 'SELECT 1', metadata: { databricks_language: 'sql' } }],
    });
    expect(result[0]).toEqual({ index: 0, content: '# MAGIC %sql\n# MAGIC SELECT 1', language: 'sql' });
  });

  it('keeps unknown cell magics as plain code', () => {
    const result = ipynbToCells({ cells: [{ cell_type: 'code', source: '%%timeit\nx' }] });
    expect(result[0]).toEqual({ index: 0, content: '%%timeit\nx', language: null });
  });

  it('prefixes line magics with MAGIC', () => {
    const result = ipynbToCells({ cells: [{ cell_type: 'code', source: '%restart_python' }] });
    expect(result[0]).toEqual({ index: 0, content: '# MAGIC %restart_python', language: null });
  });

  it('drops empty cells after the first', () => {
    const result = ipynbToCells({
      cells: [
        { cell_type: 'code', source: 'a' },
        { cell_type: 'code', source: '' },
        { cell_type: 'code', source: 'b' },
      ],
    });

    expect(result).toEqual([
      { index: 0, content: 'a', language: null },
      { index: 1, content: 'b', language: null },
    ]);
    expect(parseNotebook(serializeNotebook(result))).toEqual(result);
  });

  it('keeps an empty first cell', () => {
    const result = ipynbToCells({
      cells: [
        { cell_type: 'code', source: [] },
        { cell_type: 'code', source: 'a' },
      ],
    });

    expect(result).toEqual([
      { index: 0, content: '', language: null },
      { index: 1, content: 'a', language: null },
    ]);
    expect(parseNotebook(serializeNotebook(result))).toEqual(result);
  });

  it('rejects code containing the cell delimiter line', () => {
    expect(() =>
      ipynbToCells({ cells: [{ cell_type: 'code', source: 'x\n# COMMAND ----------\ny' }] })
    ).toThrow(MalformedInputError);
  });

  it('rejects cells of unknown type', () => {
    expect(() => ipynbToCells({ cells: [{ cell_type: 'heading', source: '' }] })).toThrow(MalformedInputError);
  });

  it('rejects a notebook without cells', () => {
    expect(() => ipynbToCells({ nbformat: 4 })).toThrow(MalformedInputError);
  });
});

describe('round-trip', () => {
  it('source to ipynb and back returns the same source', () => {
    expect(ipynbToSource(sourceToIpynb(SOURCE))).toBe(SOURCE);
  });

  it('ipynb to source without header omits the header', () => {
    const ipynb = JSON.stringify({ cells: [{ cell_type: 'code', source: ['print(1)'] }] });
    expect(ipynbToSource(ipynb, false)).toBe('print(1)');
  });

  it('rejects text that is not JSON', () => {
    expect(() => ipynbToSource('not json')).toThrow(MalformedInputError);
    expect(() => ipynbToSource('not json')).toThrow(/^Jupyter notebook is not valid JSON: /);
  });

  it('converted cells match parsing the serialized source', () => {
    const ipynb: unknown = JSON.parse(sourceToIpynb(SOURCE));
    expect(ipynbToCells(ipynb)).toEqual(parseNotebook(SOURCE));
  });
});
