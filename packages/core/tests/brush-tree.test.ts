import { expect, test, describe } from '@rstest/core';
import { buildBrushTree, walkTree } from '../src/brush-tree.js';
import { sortBrushes } from '../src/brush-source.js';
import { brush } from './helpers/brushes.js';

describe('buildBrushTree', () => {
  test('nests brushes under their container segments', () => {
    const tree = buildBrushTree([
      brush('NS.Brush.A.B.Leaf1'),
      brush('NS.Brush.A.B.Leaf2'),
      brush('NS.Brush.A.Leaf3'),
    ]);

    expect(tree.name).toBe('');
    expect(tree.values).toEqual([]);
    expect(tree.children.map(child => child.name)).toEqual(['A']);

    const a = tree.children[0];
    expect(a.values.map(value => value.name)).toEqual(['NS.Brush.A.Leaf3']);
    expect(a.children.map(child => child.name)).toEqual(['B']);

    const b = a.children[0];
    expect(b.values.map(value => value.name)).toEqual(['NS.Brush.A.B.Leaf1', 'NS.Brush.A.B.Leaf2']);
    expect(b.children).toEqual([]);
  });

  test('puts three segment names on the root', () => {
    const tree = buildBrushTree([brush('NS.Brush.Foreground'), brush('NS.Brush.Card.Background')]);

    expect(tree.values.map(value => value.name)).toEqual(['NS.Brush.Foreground']);
    expect(tree.children.map(child => child.name)).toEqual(['Card']);
  });

  test('keeps first-seen child order', () => {
    const tree = buildBrushTree([
      brush('NS.Brush.Zeta.X'),
      brush('NS.Brush.Alpha.X'),
      brush('NS.Brush.Zeta.Y'),
    ]);

    expect(tree.children.map(child => child.name)).toEqual(['Zeta', 'Alpha']);
    expect(tree.children[0].values.map(value => value.name)).toEqual(['NS.Brush.Zeta.X', 'NS.Brush.Zeta.Y']);
  });

  test('sorted input yields lexically ordered siblings', () => {
    const tree = buildBrushTree(sortBrushes([
      brush('NS.Brush.Zeta.X'),
      brush('NS.Brush.Alpha.Y'),
      brush('NS.Brush.Alpha.X'),
      brush('NS.Brush.Mid.X'),
    ]));

    expect(tree.children.map(child => child.name)).toEqual(['Alpha', 'Mid', 'Zeta']);
    expect(tree.children[0].values.map(value => value.name)).toEqual(['NS.Brush.Alpha.X', 'NS.Brush.Alpha.Y']);
  });

  test('does not collapse duplicate names', () => {
    const tree = buildBrushTree([brush('NS.Brush.A.X', '#111111'), brush('NS.Brush.A.X', '#222222')]);

    expect(tree.children).toHaveLength(1);
    expect(tree.children[0].values.map(value => value.themeValues.light)).toEqual(['#111111', '#222222']);
  });
});

describe('walkTree', () => {
  test('visits parents before children with their paths', () => {
    const tree = buildBrushTree([brush('NS.Brush.A.B.X'), brush('NS.Brush.C.Y')]);

    expect([...walkTree(tree)].map(({ path }) => path.join('/'))).toEqual(['', 'A', 'A/B', 'C']);
  });
});
