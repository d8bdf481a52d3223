import { describe, it, expect } from 'vitest';
import {
  buildChildLinkLines,
  buildPredicateLines,
  computeMaxIdLength,
  describeChildLink,
  formatPlanReport,
  idPrefix,
  renderTreeTable,
} from './plan_formatter.js';
import { createPlanRow } from './plan_tree.js';

const joinPlanRows = () => [
  createPlanRow({
    id: 1,
    text: 'Join',
    predicates: ['a=b'],
    childLinks: {
      Left: [{ variableName: '', childDescription: 'Scan(L)' }],
      Right: [{ variableName: 'r', childDescription: 'Scan(R)' }],
    },
  }),
  createPlanRow({ id: 2, text: 'Scan(L)' }),
  createPlanRow({ id: 3, text: 'Scan(R)' }),
];

describe('computeMaxIdLength', () => {
  it('is 0 for no rows', () => {
    expect(computeMaxIdLength([])).toBe(0);
  });

  it('uses the digit count of the largest id', () => {
    const rows = [1, 2, 15].map(id => createPlanRow({ id, text: 'op' }));
    expect(computeMaxIdLength(rows)).toBe(2);
  });

  it('does not depend on row order', () => {
    const rows = [120, 7, 33].map(id => createPlanRow({ id, text: 'op' }));
    expect(computeMaxIdLength(rows)).toBe(3);
  });
});

describe('renderTreeTable', () => {
  it('renders nothing for no rows, not even the header', () => {
    expect(renderTreeTable([])).toBe('');
  });

  it('right-aligns ids and left-aligns operator text', () => {
    expect(renderTreeTable(joinPlanRows()).split('\n')).toEqual([
      '+----+----------+',
      '| ID | Operator |',
      '+----+----------+',
      '| *1 | Join     |',
      '|  2 | Scan(L)  |',
      '|  3 | Scan(R)  |',
      '+----+----------+',
      '',
    ]);
  });

  it('keeps embedded newlines as continuation lines without an id', () => {
    const rows = [
      createPlanRow({ id: 0, text: 'Distributed Union' }),
      createPlanRow({ id: 12, text: '+- Serialize Result\n   (multi-line)' }),
    ];
    expect(renderTreeTable(rows).split('\n')).toEqual([
      '+----+---------------------+',
      '| ID | Operator            |',
      '+----+---------------------+',
      '|  0 | Distributed Union   |',
      '| 12 | +- Serialize Result |',
      '|    |    (multi-line)     |',
      '+----+---------------------+',
      '',
    ]);
  });

  it('sizes columns by code points, not UTF-16 units', () => {
    const rows = [createPlanRow({ id: 0, text: 'Scan \u{1F600}\u{1F600}\u{1F600}\u{1F600}' })];
    expect(renderTreeTable(rows).split('\n')).toEqual([
      '+----+-----------+',
      '| ID | Operator  |',
      '+----+-----------+',
      '|  0 | Scan \u{1F600}\u{1F600}\u{1F600}\u{1F600} |',
      '+----+-----------+',
      '',
    ]);
  });
});

describe('idPrefix', () => {
  it('right-justifies the id on the first line', () => {
    expect(idPrefix(3, 2, true)).toBe(' 3:');
  });

  it('pads with blanks of the same width afterwards', () => {
    expect(idPrefix(3, 2, false)).toBe('   ');
  });
});

describe('buildPredicateLines', () => {
  it('shows the row id once, then blank-pads', () => {
    const rows = [createPlanRow({ id: 3, text: 'Filter', predicates: ['p = 1', 'q > 2'] })];
    expect(buildPredicateLines(rows, 2)).toEqual([' 3: p = 1', '    q > 2']);
  });

  it('restarts the id prefix for every row', () => {
    const rows = [
      createPlanRow({ id: 4, text: 'Filter', predicates: ['x > 0'] }),
      createPlanRow({ id: 5, text: 'Scan', predicates: ['y < 9'] }),
    ];
    expect(buildPredicateLines(rows, 1)).toEqual(['4: x > 0', '5: y < 9']);
  });

  it('skips rows without predicates', () => {
    const rows = [
      createPlanRow({ id: 1, text: 'Union' }),
      createPlanRow({ id: 10, text: 'Filter', predicates: ['z = 1', 'w = 2'] }),
    ];
    expect(buildPredicateLines(rows, 2)).toEqual(['10: z = 1', '    w = 2']);
  });
});

describe('describeChildLink', () => {
  it('prefixes a bound variable with $', () => {
    expect(describeChildLink({ variableName: 'x', childDescription: 'Scan(Table: T)' })).toBe('$x=Scan(Table: T)');
  });

  it('uses the bare description without a variable', () => {
    expect(describeChildLink({ variableName: '', childDescription: 'Scan(Table: T)' })).toBe('Scan(Table: T)');
  });
});

describe('buildChildLinkLines', () => {
  it('visits link types in sorted order', () => {
    const rows = [
      createPlanRow({
        id: 7,
        text: 'Apply',
        childLinks: {
          Map: [{ variableName: '', childDescription: 'Scan(M)' }],
          Input: [
            { variableName: 'a', childDescription: 'Ref(A)' },
            { variableName: '', childDescription: 'Ref(B)' },
          ],
        },
      }),
    ];
    expect(buildChildLinkLines(rows, 1)).toEqual(['7: Input: $a=Ref(A), Ref(B)', '   Map: Scan(M)']);
  });

  it('always skips the untyped group', () => {
    const rows = [
      createPlanRow({
        id: 2,
        text: 'Serialize Result',
        childLinks: {
          '': [{ variableName: 'v', childDescription: 'Reference' }],
          Value: [{ variableName: '', childDescription: '$v' }],
        },
      }),
    ];
    expect(buildChildLinkLines(rows, 1)).toEqual(['2: Value: $v']);
  });

  it('gives the id to the first line actually produced', () => {
    const rows = [
      createPlanRow({
        id: 5,
        text: 'Join',
        childLinks: {
          A: [{ variableName: '', childDescription: '' }],
          B: [{ variableName: '', childDescription: 'Scan(B)' }],
          C: [{ variableName: '', childDescription: 'Scan(C)' }],
        },
      }),
    ];
    expect(buildChildLinkLines(rows, 2)).toEqual([' 5: B: Scan(B)', '    C: Scan(C)']);
  });

  it('keeps its id state apart from the predicate pass', () => {
    const [join] = joinPlanRows();
    expect(buildPredicateLines([join], 1)).toEqual(['1: a=b']);
    expect(buildChildLinkLines([join], 1)).toEqual(['1: Left: Scan(L)', '   Right: $r=Scan(R)']);
  });
});

describe('formatPlanReport', () => {
  it('is empty for no rows', () => {
    expect(formatPlanReport([])).toBe('');
  });

  it('is just the table when no row has predicates', () => {
    const rows = [
      createPlanRow({ id: 0, text: 'Union', childLinks: { Left: [{ variableName: '', childDescription: 'Scan' }] } }),
      createPlanRow({ id: 1, text: '+- Scan' }),
    ];
    expect(formatPlanReport(rows)).toBe(renderTreeTable(rows));
  });

  it('appends the predicate section after the table', () => {
    expect(formatPlanReport(joinPlanRows())).toBe([
      '+----+----------+',
      '| ID | Operator |',
      '+----+----------+',
      '| *1 | Join     |',
      '|  2 | Scan(L)  |',
      '|  3 | Scan(R)  |',
      '+----+----------+',
      'Predicates(identified by ID):',
      ' 1: a=b',
      '',
    ].join('\n'));
  });

  it('appends child links when asked for them', () => {
    const report = formatPlanReport(joinPlanRows(), { includeChildLinks: true });
    expect(report.split('\n').slice(7)).toEqual([
      'Predicates(identified by ID):',
      ' 1: a=b',
      'Child Links(identified by ID):',
      ' 1: Left: Scan(L)',
      '    Right: $r=Scan(R)',
      '',
    ]);
  });
});
