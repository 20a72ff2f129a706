import { describe, expect, it } from 'vitest';
import {
  DegenerateLabelSpaceError,
  EmptyInputError,
  PartitionMismatchError,
} from '../src/errors.js';
import { evaluateClassifier } from '../src/evaluate.js';
import { InMemoryPartitionedSequence } from '../src/partition/in-memory.js';
import { setup, WORKERS } from './helpers.js';

describe('evaluateClassifier', () => {
  it('computes every metric with one label-space round', async () => {
    const { coordinator, yTrue, yPred } = setup([0, 0, 1, 1], [0, 1, 1, 1]);
    const report = await evaluateClassifier(coordinator, yTrue, yPred, {
      name: 'reviews',
      classNames: { '0': 'NEG', '1': 'POS' },
    });

    expect(report.name).toBe('reviews');
    expect(report.rows).toBe(4);
    expect(report.labelSpace.labels).toEqual([0, 1]);
    expect(report.classLabels).toEqual(['NEG', 'POS']);
    expect(report.accuracy.value).toBe(0.75);
    expect(report.precision.average).toBe('macro');
    expect(report.precision.value).toBeCloseTo(5 / 6);
    expect(report.precision.perClass[0]).toBe(1);
    expect(report.precision.perClass[1]).toBeCloseTo(2 / 3);
    expect(report.confusionMatrix.matrix).toEqual([
      [1, 1],
      [0, 2],
    ]);
    expect(report.confusionMatrix.title).toBe('Confusion Matrix');
    expect(report.rounds.map((r) => r.name)).toEqual([
      'label-space',
      'accuracy',
      'precision',
      'confusion-matrix',
    ]);
    expect(report.analyses().map((a) => a.type)).toEqual([
      'scalar',
      'precision',
      'confusion_matrix',
    ]);
  });

  it('passes normalization and weights through', async () => {
    const { coordinator, yTrue, yPred } = setup([0, 0, 1, 1], [0, 1, 1, 1]);
    const weights = InMemoryPartitionedSequence.fromArray([1, 3, 1, 1], WORKERS);
    const report = await evaluateClassifier(coordinator, yTrue, yPred, {
      average: 'micro',
      normalize: 'true',
      weights,
    });
    expect(report.name).toBe('classifier');
    expect(report.precision.value).toBe(0.75);
    expect(report.confusionMatrix.normalize).toBe('true');
    expect(report.confusionMatrix.title).toBe('Confusion Matrix (normalize=true)');
    expect(report.confusionMatrix.matrix).toEqual([
      [0.25, 0.75],
      [0, 1],
    ]);
    expect(report.classLabels).toEqual(['0', '1']);
  });

  it('only reports rounds of its own run', async () => {
    const { coordinator, yTrue, yPred } = setup([0, 0, 1, 1], [0, 1, 1, 1]);
    await evaluateClassifier(coordinator, yTrue, yPred);
    const second = await evaluateClassifier(coordinator, yTrue, yPred);
    expect(second.rounds).toHaveLength(4);
    expect(coordinator.rounds).toHaveLength(8);
  });

  it('keeps the round logs of concurrent runs apart', async () => {
    const { coordinator, yTrue, yPred } = setup([0, 0, 1, 1], [0, 1, 1, 1]);
    const [a, b] = await Promise.all([
      evaluateClassifier(coordinator, yTrue, yPred, { name: 'a' }),
      evaluateClassifier(coordinator, yTrue, yPred, { name: 'b' }),
    ]);

    const order = ['label-space', 'accuracy', 'precision', 'confusion-matrix'];
    expect(a.rounds.map((r) => r.name)).toEqual(order);
    expect(b.rounds.map((r) => r.name)).toEqual(order);
    const aIds = new Set(a.rounds.map((r) => r.id));
    expect(b.rounds.some((r) => aIds.has(r.id))).toBe(false);
    expect(coordinator.rounds).toHaveLength(8);
  });

  it('resolves the label space before any metric round', async () => {
    const { coordinator, yTrue, yPred } = setup([0, 0, 1, 1], [0, 1, 1, 1]);
    const report = await evaluateClassifier(coordinator, yTrue, yPred);
    expect(report.rounds[0]?.name).toBe('label-space');
    expect(coordinator.rounds[0]?.name).toBe('label-space');
  });

  it('stops after the label-space round when precision is undefined', async () => {
    const { coordinator, yTrue, yPred } = setup([0, 1, 2, 2], [0, 1, 2, 1]);
    await expect(
      evaluateClassifier(coordinator, yTrue, yPred, { average: 'binary' }),
    ).rejects.toThrow('Binary precision is undefined for more than two classes');
    expect(coordinator.rounds.map((r) => r.name)).toEqual(['label-space']);
  });

  it('fails the run on a single-class label space', async () => {
    const { coordinator, yTrue, yPred } = setup([1, 1], [1, 1]);
    await expect(evaluateClassifier(coordinator, yTrue, yPred)).rejects.toBeInstanceOf(
      DegenerateLabelSpaceError,
    );
  });

  it('fails before dispatching on misaligned input', async () => {
    const { coordinator, yTrue } = setup([0, 0, 1, 1], [0, 1, 1, 1]);
    const yPred = InMemoryPartitionedSequence.fromArray([0, 1, 1, 1, 0], WORKERS);
    await expect(evaluateClassifier(coordinator, yTrue, yPred)).rejects.toBeInstanceOf(
      PartitionMismatchError,
    );
    expect(coordinator.rounds).toHaveLength(0);
  });

  it('fails before dispatching on empty input', async () => {
    const { coordinator, yTrue, yPred } = setup([], []);
    await expect(evaluateClassifier(coordinator, yTrue, yPred)).rejects.toBeInstanceOf(
      EmptyInputError,
    );
    expect(coordinator.rounds).toHaveLength(0);
  });
});
