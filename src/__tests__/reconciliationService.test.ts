import { AmbiguousDuplicateError } from '../errors';
import { parseRawPage } from '../services/lineItemParser';
import {
  detectDuplicates,
  extractAndReconcile,
  rawTextCompleteness,
  reconcileTotal,
} from '../services/reconciliationService';
import type { LineItem, ReconciliationOptions } from '../types/bill';

const options: ReconciliationOptions = { similarityThreshold: 0.85, amountEpsilon: 1 };

const makeItem = (fields: Partial<LineItem> = {}): LineItem => ({
  description: 'Item',
  quantity: 1,
  unit_price: 0,
  line_total: 0,
  page_index: 0,
  item_index: 0,
  raw_text: '',
  ...fields,
});

describe('detectDuplicates', () => {
  it('returns no groups when every charge is distinct', () => {
    const items = [
      makeItem({ description: 'Paracetamol', line_total: 2000, item_index: 0 }),
      makeItem({ description: 'Ibuprofen', line_total: 1500, item_index: 1 }),
      makeItem({ description: 'Chest X-ray', line_total: 120000, item_index: 2 }),
    ];

    expect(detectDuplicates(items, options)).toEqual([]);
  });

  it('groups case variants and keeps the earliest item as canonical', () => {
    const items = [
      makeItem({ description: 'Paracetamol', quantity: 2, unit_price: 10, line_total: 20, item_index: 0 }),
      makeItem({ description: 'paracetamol', quantity: 2, unit_price: 10, line_total: 20, item_index: 1 }),
    ];

    expect(detectDuplicates(items, options)).toEqual([
      { item_indices: [0, 1], canonical_index: 0, duplicate_indices: [1] },
    ]);
  });

  it('collapses whitespace before comparing descriptions', () => {
    const items = [
      makeItem({ description: '  CBC   Test ', line_total: 45000, item_index: 0 }),
      makeItem({ description: 'cbc test', line_total: 45000, page_index: 1 }),
    ];

    expect(detectDuplicates(items, options)).toHaveLength(1);
  });

  it('matches near-identical descriptions above the threshold', () => {
    const items = [
      makeItem({ description: 'Paracetamol 500mg', line_total: 3000, item_index: 0 }),
      makeItem({ description: 'Paracetamol 500 mg', line_total: 3000, item_index: 1 }),
    ];

    expect(detectDuplicates(items, options)[0].item_indices).toEqual([0, 1]);
  });

  it('does not match different charges that share a total', () => {
    const items = [
      makeItem({ description: 'Blood culture', line_total: 45000, item_index: 0 }),
      makeItem({ description: 'Urine culture', line_total: 45000, item_index: 1 }),
    ];

    expect(detectDuplicates(items, options)).toEqual([]);
  });

  it('compares totals within the amount tolerance', () => {
    const base = makeItem({ description: 'Consultation', line_total: 70000 });

    expect(
      detectDuplicates([base, { ...base, line_total: 70001, item_index: 1 }], options)
    ).toHaveLength(1);
    expect(
      detectDuplicates([base, { ...base, line_total: 70002, item_index: 1 }], options)
    ).toEqual([]);
  });

  it('does not chain near-duplicates beyond the canonical item', () => {
    const items = [
      makeItem({ description: 'Consultation', line_total: 70000, item_index: 0 }),
      makeItem({ description: 'Consultation', line_total: 70001, item_index: 1 }),
      makeItem({ description: 'Consultation', line_total: 70002, item_index: 2 }),
    ];

    expect(detectDuplicates(items, options)).toEqual([
      { item_indices: [0, 1], canonical_index: 0, duplicate_indices: [1] },
    ]);
  });

  it('joins an item to the group whose canonical item it matches', () => {
    const items = [
      makeItem({ description: 'Consultation', line_total: 70001, item_index: 0 }),
      makeItem({ description: 'Consultation', line_total: 70002, item_index: 1 }),
      makeItem({ description: 'Consultation', line_total: 70000, item_index: 2 }),
    ];

    expect(detectDuplicates(items, options)).toEqual([
      { item_indices: [0, 1, 2], canonical_index: 0, duplicate_indices: [1, 2] },
    ]);
  });

  it('puts every item with the same description and total in one group', () => {
    const items = [
      makeItem({ description: 'Room Rent', line_total: 500000, page_index: 0 }),
      makeItem({ description: 'Dressing', line_total: 300, page_index: 0, item_index: 1 }),
      makeItem({ description: 'Room Rent', line_total: 500000, page_index: 1 }),
      makeItem({ description: 'Room Rent', line_total: 500000, page_index: 2 }),
    ];

    expect(detectDuplicates(items, options)).toEqual([
      { item_indices: [0, 2, 3], canonical_index: 0, duplicate_indices: [2, 3] },
    ]);
  });

  it('prefers the item whose raw text has the most columns', () => {
    const items = [
      makeItem({ description: 'Paracetamol', line_total: 2000, raw_text: 'Paracetamol' }),
      makeItem({
        description: 'Paracetamol',
        line_total: 2000,
        page_index: 1,
        raw_text: 'Paracetamol | 2 | 10.00 | 20.00',
      }),
    ];

    expect(detectDuplicates(items, options)).toEqual([
      { item_indices: [0, 1], canonical_index: 1, duplicate_indices: [0] },
    ]);
  });

  it('raises when distinct candidates tie on every criterion', () => {
    const items = [
      makeItem({ description: 'Dressing', line_total: 300 }),
      makeItem({ description: 'DRESSING', line_total: 300 }),
    ];

    expect(() => detectDuplicates(items, options)).toThrow(AmbiguousDuplicateError);
    try {
      detectDuplicates(items, options);
    } catch (error) {
      expect(error).toBeInstanceOf(AmbiguousDuplicateError);
      if (error instanceof AmbiguousDuplicateError) {
        expect(error.conflictingIndices).toEqual([0, 1]);
        expect(error.status).toBe(422);
      }
    }
  });

  it('resolves a tie between identical items to the first one', () => {
    const item = makeItem({ description: 'Dressing', line_total: 300 });

    expect(detectDuplicates([item, { ...item }], options)).toEqual([
      { item_indices: [0, 1], canonical_index: 0, duplicate_indices: [1] },
    ]);
  });
});

describe('rawTextCompleteness', () => {
  it('counts non-empty columns', () => {
    expect(rawTextCompleteness('Paracetamol | 2 | 10.00 | 20.00')).toBe(4);
    expect(rawTextCompleteness('Room Rent\t1\t5000')).toBe(3);
    expect(rawTextCompleteness('Consultation   1   700')).toBe(3);
    expect(rawTextCompleteness(' | | ')).toBe(0);
    expect(rawTextCompleteness('')).toBe(0);
  });
});

describe('reconcileTotal', () => {
  it('reports a match when the computed total equals the reported one', () => {
    const items = [makeItem({ line_total: 5000 }), makeItem({ line_total: 4500 })];

    expect(reconcileTotal(items, 9500, options)).toEqual({
      verdict: 'MATCH',
      computed_total: 9500,
      reported_total: 9500,
      difference: 0,
    });
  });

  it('reports a signed difference on mismatch', () => {
    const items = [makeItem({ line_total: 6000 }), makeItem({ line_total: 3000 })];

    expect(reconcileTotal(items, 10000, options)).toEqual({
      verdict: 'MISMATCH',
      computed_total: 9000,
      reported_total: 10000,
      difference: -1000,
    });
  });

  it('treats a difference within tolerance as a match', () => {
    const verdict = reconcileTotal([makeItem({ line_total: 9501 })], 9500, options);

    expect(verdict.verdict).toBe('MATCH');
    expect(verdict.difference).toBe(1);
  });

  it('is unverifiable without a reported total', () => {
    expect(reconcileTotal([makeItem({ line_total: 700 })], undefined, options)).toEqual({
      verdict: 'UNVERIFIABLE',
      computed_total: 700,
      reported_total: null,
      difference: null,
    });
    expect(reconcileTotal([makeItem({ line_total: 700 })], null, options).verdict).toBe(
      'UNVERIFIABLE'
    );
  });

  it('skips duplicates and malformed items', () => {
    const items = [
      { line_total: 2000 },
      { line_total: 2000, is_duplicate: true },
      { line_total: 500, validation_error: 'missing unit_price' },
      { line_total: null, validation_error: 'missing line_total' },
    ];

    expect(reconcileTotal(items, 2000, options).computed_total).toBe(2000);
  });

  it('returns the same verdict when run twice', () => {
    const items = [makeItem({ line_total: 1234 }), makeItem({ line_total: 766 })];

    expect(reconcileTotal(items, 2500, options)).toEqual(reconcileTotal(items, 2500, options));
  });
});

describe('extractAndReconcile', () => {
  const pages = () => [
    parseRawPage(
      {
        page_no: '1',
        page_type: 'Pharmacy',
        bill_items: [
          { item_name: 'Paracetamol', item_quantity: 2, item_rate: 10, item_amount: 20 },
          { item_name: 'Bandage', item_quantity: 1, item_amount: 5 },
        ],
      },
      0
    ),
    parseRawPage(
      {
        page_no: '2',
        page_type: 'Bill Detail',
        bill_items: [
          { item_name: 'paracetamol', item_quantity: 2, item_rate: 10, item_amount: 20 },
          { item_name: 'Consultation', item_quantity: 1, item_rate: 50, item_amount: 55 },
        ],
      },
      1
    ),
  ];

  it('flags duplicates, malformed items and line mismatches without dropping anything', () => {
    const result = extractAndReconcile(pages(), 7500, options);

    expect(result.total_item_count).toBe(4);
    expect(result.deduplicated_item_count).toBe(3);
    expect(result.computed_grand_total).toBe(7500);
    expect(result.reported_grand_total).toBe(7500);
    expect(result.reconciliation).toEqual({
      verdict: 'MATCH',
      computed_total: 7500,
      reported_total: 7500,
      difference: 0,
    });
    expect(result.duplicate_groups).toEqual([
      { item_indices: [0, 2], canonical_index: 0, duplicate_indices: [2] },
    ]);
    expect(result.quality).toEqual({
      valid_item_count: 3,
      invalid_item_count: 1,
      line_total_mismatch_count: 1,
    });

    const [pharmacy, detail] = result.pages;
    expect(pharmacy.items[1]).toEqual({
      description: 'Bandage',
      quantity: 1,
      unit_price: null,
      line_total: 500,
      page_index: 0,
      item_index: 1,
      raw_text: '',
      is_duplicate: false,
      duplicate_of: null,
      validation_error: 'missing unit_price',
      line_total_mismatch: false,
      expected_line_total: null,
    });
    expect(detail.items[0].is_duplicate).toBe(true);
    expect(detail.items[0].duplicate_of).toBe(0);
    expect(detail.items[1].line_total_mismatch).toBe(true);
    expect(detail.items[1].expected_line_total).toBe(5000);
  });

  it('keeps charges that only match through another near-duplicate', () => {
    const result = extractAndReconcile(
      [
        parseRawPage(
          {
            bill_items: [
              { item_name: 'Consultation', item_quantity: 1, item_rate: 700, item_amount: 700 },
              { item_name: 'Consultation', item_quantity: 1, item_rate: 700, item_amount: 700.01 },
              { item_name: 'Consultation', item_quantity: 1, item_rate: 700, item_amount: 700.02 },
            ],
          },
          0
        ),
      ],
      null,
      options
    );

    expect(result.duplicate_groups).toEqual([
      { item_indices: [0, 1], canonical_index: 0, duplicate_indices: [1] },
    ]);
    expect(result.pages[0].items.map((item) => item.is_duplicate)).toEqual([false, true, false]);
    expect(result.computed_grand_total).toBe(140002);
  });

  it('reports ambiguous duplicates at their positions among all items', () => {
    const rescans = [0, 1].map((position) =>
      parseRawPage(
        {
          page_index: 0,
          bill_items: [
            'Total 500',
            {
              item_name: position ? 'DRESSING' : 'Dressing',
              item_quantity: 1,
              item_rate: 3,
              item_amount: 3,
            },
          ],
        },
        position
      )
    );

    expect(() => extractAndReconcile(rescans, null, options)).toThrow(AmbiguousDuplicateError);
    try {
      extractAndReconcile(rescans, null, options);
    } catch (error) {
      expect(error).toBeInstanceOf(AmbiguousDuplicateError);
      if (error instanceof AmbiguousDuplicateError) {
        expect(error.conflictingIndices).toEqual([1, 3]);
      }
    }
  });

  it('is deterministic for identical input', () => {
    expect(extractAndReconcile(pages(), null, options)).toEqual(
      extractAndReconcile(pages(), null, options)
    );
  });

  it('handles an empty bill', () => {
    const result = extractAndReconcile([], undefined, options);

    expect(result.total_item_count).toBe(0);
    expect(result.duplicate_groups).toEqual([]);
    expect(result.reconciliation.verdict).toBe('UNVERIFIABLE');
  });
});
