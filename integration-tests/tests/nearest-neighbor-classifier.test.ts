/**
 * Nearest-Neighbor Voting Classifier Tests
 */

import {
  InMemoryExampleIndex,
  NearestNeighborClassifier,
  NO_HISTORY_REASONING,
  majorityVote,
  type Example,
} from '@civic-appeals/shared';
import { FakeEmbedder, makeExample } from './helpers';

function classifierFor(
  examples: Example[],
  topK: number,
  embedder: FakeEmbedder = new FakeEmbedder(),
  urgencyTrustedMaxId: number | null = null
) {
  const index = new InMemoryExampleIndex(examples);
  return { index, classifier: new NearestNeighborClassifier(embedder, index, { topK, urgencyTrustedMaxId }) };
}

describe('NearestNeighborClassifier', () => {
  it('is fully confident when all neighbors agree at distance 0', async () => {
    const { classifier } = classifierFor(
      [
        makeExample(1, 'water_supply', [1, 0, 0]),
        makeExample(2, 'water_supply', [1, 0, 0]),
        makeExample(3, 'water_supply', [1, 0, 0]),
      ],
      3
    );

    const result = await classifier.classify('Немає води');

    expect(result.categoryId).toBe('water_supply');
    expect(result.confidence).toBeGreaterThanOrEqual(0.95);
    expect(result.confidence).toBe(1);
    expect(result.isUrgent).toBe(false);
    expect(result.isRelevant).toBe(true);
    expect(result.reasoning).toBe(
      "[KNN] 3/3 similar complaints were classified as 'water_supply'. Urgency: 3/3 voted not urgent."
    );
  });

  it('returns the stored category and urgency for the text of a stored example (k = 1)', async () => {
    const embedder = new FakeEmbedder({ 'Пахне газом у під\'їзді': [0, 1, 0] });
    const { classifier } = classifierFor(
      [
        makeExample(1, 'water_supply', [1, 0, 0], false, 'Немає води'),
        makeExample(2, 'gas', [0, 1, 0], true, 'Пахне газом у під\'їзді'),
      ],
      1,
      embedder
    );

    const result = await classifier.classify('Пахне газом у під\'їзді');

    expect(result.categoryId).toBe('gas');
    expect(result.isUrgent).toBe(true);
    expect(result.confidence).toBe(1);
    expect(result.urgencyConfidence).toBe(1);
  });

  it('blends vote share with separation from the nearest competitor', async () => {
    const { classifier } = classifierFor(
      [
        makeExample(1, 'water_supply', [1, 0, 0], true),
        makeExample(2, 'water_supply', [1, 0, 0], true),
        makeExample(3, 'heating', [0, 1, 0], false),
      ],
      3
    );

    const result = await classifier.classify('Прорвало трубу');

    // 0.5 * 2/3 + 0.5 * (1 - 0) / (1 + 1e-9)
    expect(result.categoryId).toBe('water_supply');
    expect(result.confidence).toBeCloseTo(0.833333, 5);
    expect(result.isUrgent).toBe(true);
    expect(result.urgencyConfidence).toBeCloseTo(0.833333, 5);
  });

  it('breaks vote ties in favor of the label seen first, nearest first', async () => {
    const { classifier } = classifierFor(
      [
        makeExample(5, 'yard', [1, 0, 0]),
        makeExample(6, 'roads', [2, 0, 0]),
        makeExample(7, 'roads', [0, 1, 0]),
        makeExample(8, 'yard', [0, 0, 1]),
      ],
      4
    );

    const result = await classifier.classify('Сміття у дворі');

    expect(result.categoryId).toBe('yard');
    // vote 2/4, no separation from the equally close rival
    expect(result.confidence).toBeCloseTo(0.25, 9);
  });

  it('votes urgency only over trusted examples when a trusted id range is set', async () => {
    const { classifier, index } = classifierFor(
      [
        makeExample(1, 'water_supply', [1, 0, 0], false),
        makeExample(2, 'water_supply', [1, 0, 0], true),
        makeExample(3, 'water_supply', [1, 0, 0], true),
      ],
      3,
      new FakeEmbedder(),
      1
    );
    const nearestSpy = jest.spyOn(index, 'nearest');

    const result = await classifier.classify('Немає води');

    expect(result.categoryId).toBe('water_supply');
    expect(result.isUrgent).toBe(false);
    expect(result.urgencyConfidence).toBe(1);
    expect(nearestSpy).toHaveBeenCalledTimes(2);
    expect(nearestSpy).toHaveBeenLastCalledWith([1, 0, 0], 3, { maxId: 1 });
  });

  it('degrades to "other" with zero confidence when there are no examples', async () => {
    const { classifier } = classifierFor([], 10);

    const result = await classifier.classify('Будь-що');

    expect(result).toEqual({
      categoryId: 'other',
      confidence: 0,
      reasoning: NO_HISTORY_REASONING,
      isUrgent: false,
      isRelevant: true,
      urgencyConfidence: 0,
    });
  });

  it('keeps confidence within [0, 1] for a degenerate query embedding', async () => {
    const { classifier } = classifierFor(
      [makeExample(1, 'water_supply', [1, 0, 0]), makeExample(2, 'gas', [0, 1, 0])],
      2,
      new FakeEmbedder({}, [0, 0, 0])
    );

    const result = await classifier.classify('...');

    // Both neighbors at distance 2: vote 1/2, no separation
    expect(result.categoryId).toBe('water_supply');
    expect(result.confidence).toBeCloseTo(0.25, 9);
  });
});

describe('majorityVote', () => {
  it('returns null for an empty neighbor set', () => {
    expect(majorityVote([], (example) => example.category_id)).toBeNull();
  });

  it('scores a lone far neighbor by its distance alone', () => {
    const vote = majorityVote(
      [{ example: makeExample(1, 'gas', [1, 0, 0]), distance: 1 }],
      (example) => example.category_id
    );

    // 0.5 * 1 + 0.5 * (1 - 1 / 2)
    expect(vote).toEqual({ winner: 'gas', votes: 1, total: 1, confidence: 0.75 });
  });
});
