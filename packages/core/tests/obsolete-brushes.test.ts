import { expect, test, describe } from '@rstest/core';
import { withoutIgnored } from '../src/brush-source.js';
import { DEFAULT_CONFIG } from '../src/config.js';
import { TemplateMarkerError } from '../src/errors.js';
import { emitObsoleteBrushes, obsoleteBrushBindings, spliceAtMarker } from '../src/emitters/obsolete-brushes.js';
import { brush, sampleBrushes } from './helpers/brushes.js';

const template = [
  '<ResourceDictionary xmlns="http://schemas.microsoft.com/winfx/2006/xaml/presentation"',
  '                    xmlns:x="http://schemas.microsoft.com/winfx/2006/xaml"',
  '                    xmlns:colors="clr-namespace:MaterialDesignColors;assembly=MaterialDesignColors">',
  '  <!-- Hand-written aliases stay above -->',
  '  <!-- INSERT HERE -->',
  '</ResourceDictionary>',
  '',
].join('\n');

describe('obsoleteBrushBindings', () => {
  test('points each obsolete key at the canonical name, not the value', () => {
    const bindings = obsoleteBrushBindings([
      brush('MaterialDesign.Brush.Primary', '#112233', '#445566', { obsoleteKeys: ['PrimaryHueMidBrush'] }),
    ]);

    expect(bindings).toEqual([
      '  <colors:StaticResource x:Key="PrimaryHueMidBrush" ResourceKey="MaterialDesign.Brush.Primary" />',
    ]);
  });

  test('skips brushes without obsolete keys', () => {
    expect(obsoleteBrushBindings([brush('NS.Brush.A'), brush('NS.Brush.B', '#000000', '#000000', { obsoleteKeys: [] })])).toEqual([]);
  });
});

describe('emitObsoleteBrushes', () => {
  test('replaces only the marker line', () => {
    const output = emitObsoleteBrushes([
      brush('NS.Brush.A', '#000000', '#000000', { obsoleteKeys: ['OldA'] }),
      brush('NS.Brush.B', '#000000', '#000000', { obsoleteKeys: ['OldB'] }),
    ], template);

    expect(output).toBe([
      '<ResourceDictionary xmlns="http://schemas.microsoft.com/winfx/2006/xaml/presentation"',
      '                    xmlns:x="http://schemas.microsoft.com/winfx/2006/xaml"',
      '                    xmlns:colors="clr-namespace:MaterialDesignColors;assembly=MaterialDesignColors">',
      '  <!-- Hand-written aliases stay above -->',
      '  <colors:StaticResource x:Key="OldA" ResourceKey="NS.Brush.A" />',
      '  <colors:StaticResource x:Key="OldB" ResourceKey="NS.Brush.B" />',
      '</ResourceDictionary>',
      '',
    ].join('\n'));
  });

  test('leaves the template unchanged when nothing is obsolete', () => {
    expect(emitObsoleteBrushes([brush('NS.Brush.A')], template)).toBe(template);
  });

  test('never aliases the ignored sentinel', () => {
    const output = emitObsoleteBrushes(withoutIgnored(sampleBrushes, DEFAULT_CONFIG.ignoredBrushName), template);

    expect(output).not.toContain('ShouldNotAppear');
    expect(output).toContain('  <colors:StaticResource x:Key="MaterialDesignBodyLight" ResourceKey="MaterialDesign.Brush.Foreground" />');
  });

  test('fails when the template has no marker', () => {
    expect(() => emitObsoleteBrushes([brush('NS.Brush.A')], '<ResourceDictionary />\n')).toThrow(TemplateMarkerError);
  });

  test('does not treat a marker followed by other content as the marker line', () => {
    const withTrailing = '<R>\n  <!-- INSERT HERE --> <Keep x:Key="K" />\n</R>\n';
    const obsolete = [brush('NS.Brush.A', '#000000', '#000000', { obsoleteKeys: ['OldA'] })];

    expect(() => emitObsoleteBrushes(obsolete, withTrailing)).toThrow(TemplateMarkerError);
    expect(emitObsoleteBrushes(obsolete, `${withTrailing}  <!-- INSERT HERE -->\n`)).toBe(
      '<R>\n  <!-- INSERT HERE --> <Keep x:Key="K" />\n</R>\n  <colors:StaticResource x:Key="OldA" ResourceKey="NS.Brush.A" />\n'
    );
  });
});

describe('spliceAtMarker', () => {
  test('only the first marker is replaced', () => {
    const output = spliceAtMarker('a\n<!-- INSERT HERE -->\nb\n\t<!-- INSERT HERE -->\n', ['X']);

    expect(output).toBe('a\nX\nb\n\t<!-- INSERT HERE -->\n');
  });

  test('keeps CRLF line endings', () => {
    expect(spliceAtMarker('a\r\n  <!-- INSERT HERE -->\r\nb\r\n', ['X', 'Y'])).toBe('a\r\nX\r\nY\r\nb\r\n');
  });

  test('accepts trailing whitespace after the marker', () => {
    expect(spliceAtMarker('a\n  <!-- INSERT HERE -->  \t\nb\n', ['X'])).toBe('a\nX\nb\n');
  });
});
