import { DatasetShapeError, InvalidSplitRatioError } from "../errors";
import { createRandom, shuffleInPlace } from "./random";

export type SplitOptions = {
  ratio: number;
  seed: number;
  stratify: boolean;
};

export type SplitInput<X, Y> = {
  x: X[];
  y: Y[];
  ids?: string[];
};

export type SplitResult<X, Y> = {
  xTrain: X[];
  xTest: X[];
  yTrain: Y[];
  yTest: Y[];
  idsTrain: string[];
  idsTest: string[];
};

export const validateSplitRatio = (ratio: number): void => {
  if (!Number.isFinite(ratio) || ratio <= 0 || ratio >= 1) {
    throw new InvalidSplitRatioError(
      `Split ratio must be a number strictly between 0 and 1, got ${ratio}.`
    );
  }
};

const groupByLabel = <Y extends string | number>(labels: Y[]): Map<Y, number[]> => {
  const groups = new Map<Y, number[]>();
  labels.forEach((label, index) => {
    const group = groups.get(label);
    if (group) {
      group.push(index);
    } else {
      groups.set(label, [index]);
    }
  });
  return groups;
};

const compareLabels = (a: string | number, b: string | number): number =>
  String(a) < String(b) ? -1 : String(a) > String(b) ? 1 : 0;

/**
 * Train counts per label: floor(count * ratio), then the records still
 * missing from floor(total * ratio) go to the labels with the largest
 * remainders (ties in label order).
 */
export const allocateStratifiedCounts = (
  groupSizes: number[],
  ratio: number
): number[] => {
  const total = groupSizes.reduce((sum, size) => sum + size, 0);
  const target = Math.floor(total * ratio);
  const exact = groupSizes.map((size) => size * ratio);
  const counts = exact.map((value) => Math.floor(value));
  let missing = target - counts.reduce((sum, count) => sum + count, 0);

  const byRemainder = exact
    .map((value, index) => ({ index, remainder: value - Math.floor(value) }))
    .sort((a, b) => b.remainder - a.remainder || a.index - b.index);

  for (const { index } of byRemainder) {
    if (missing <= 0) {
      break;
    }
    if (counts[index] < groupSizes[index]) {
      counts[index] += 1;
      missing -= 1;
    }
  }
  return counts;
};

const randomIndices = (
  length: number,
  ratio: number,
  random: () => number
): { train: number[]; test: number[] } => {
  const indices = shuffleInPlace(
    Array.from({ length }, (_, index) => index),
    random
  );
  const splitIndex = Math.floor(length * ratio);
  return { train: indices.slice(0, splitIndex), test: indices.slice(splitIndex) };
};

const stratifiedIndices = <Y extends string | number>(
  labels: Y[],
  ratio: number,
  random: () => number
): { train: number[]; test: number[] } => {
  const groups = [...groupByLabel(labels).entries()].sort(([a], [b]) => compareLabels(a, b));
  const counts = allocateStratifiedCounts(
    groups.map(([, indices]) => indices.length),
    ratio
  );

  const train: number[] = [];
  const test: number[] = [];
  groups.forEach(([, indices], groupIndex) => {
    const shuffled = shuffleInPlace([...indices], random);
    train.push(...shuffled.slice(0, counts[groupIndex]));
    test.push(...shuffled.slice(counts[groupIndex]));
  });

  return { train: shuffleInPlace(train, random), test: shuffleInPlace(test, random) };
};

/**
 * Partitions a dataset into train and test subsets. The same seed and input
 * always produce the same split.
 */
export const applySplit = <X, Y extends string | number>(
  data: SplitInput<X, Y>,
  options: SplitOptions
): SplitResult<X, Y> => {
  validateSplitRatio(options.ratio);
  if (data.x.length !== data.y.length) {
    throw new DatasetShapeError(
      `Feature count ${data.x.length} does not match label count ${data.y.length}.`
    );
  }
  if (data.ids && data.ids.length !== data.x.length) {
    throw new DatasetShapeError(
      `Id count ${data.ids.length} does not match feature count ${data.x.length}.`
    );
  }
  if (data.x.length === 0) {
    throw new InvalidSplitRatioError("Cannot split an empty dataset.");
  }

  const random = createRandom(options.seed);
  const { train, test } = options.stratify
    ? stratifiedIndices(data.y, options.ratio, random)
    : randomIndices(data.x.length, options.ratio, random);

  const ids = data.ids ?? data.x.map((_, index) => String(index));
  return {
    xTrain: train.map((index) => data.x[index]),
    xTest: test.map((index) => data.x[index]),
    yTrain: train.map((index) => data.y[index]),
    yTest: test.map((index) => data.y[index]),
    idsTrain: train.map((index) => ids[index]),
    idsTest: test.map((index) => ids[index])
  };
};
