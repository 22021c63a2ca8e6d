export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/** Population standard deviation. */
export function stdDev(values: number[]): number {
  if (values.length === 0) return 0;
  const avg = mean(values);
  return Math.sqrt(mean(values.map((value) => (value - avg) ** 2)));
}

/** Linear-interpolated quantile of unsorted values, q in [0, 1]. */
export function quantile(values: number[], q: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  if (lower === upper) return sorted[lower];
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
}

export type Regression = { slope: number; intercept: number; r2: number };

export function linearRegression(xs: number[], ys: number[]): Regression {
  const n = Math.min(xs.length, ys.length);
  if (n < 2) return { slope: 0, intercept: ys[0] ?? 0, r2: 0 };
  const mx = mean(xs.slice(0, n));
  const my = mean(ys.slice(0, n));
  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  for (let i = 0; i < n; i += 1) {
    sxy += (xs[i] - mx) * (ys[i] - my);
    sxx += (xs[i] - mx) ** 2;
    syy += (ys[i] - my) ** 2;
  }
  if (sxx === 0) return { slope: 0, intercept: my, r2: 0 };
  const slope = sxy / sxx;
  const intercept = my - slope * mx;
  const r2 = syy === 0 ? 0 : (sxy * sxy) / (sxx * syy);
  return { slope, intercept, r2 };
}

export function pearson(xs: number[], ys: number[]): number | null {
  const n = Math.min(xs.length, ys.length);
  if (n < 3) return null;
  const mx = mean(xs.slice(0, n));
  const my = mean(ys.slice(0, n));
  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  for (let i = 0; i < n; i += 1) {
    sxy += (xs[i] - mx) * (ys[i] - my);
    sxx += (xs[i] - mx) ** 2;
    syy += (ys[i] - my) ** 2;
  }
  if (sxx === 0 || syy === 0) return null;
  return sxy / Math.sqrt(sxx * syy);
}

/** Ranks with ties sharing their average rank (1-based). */
export function rank(values: number[]): number[] {
  const order = values.map((value, index) => ({ value, index })).sort((a, b) => a.value - b.value);
  const ranks = new Array<number>(values.length).fill(0);
  let i = 0;
  while (i < order.length) {
    let j = i;
    while (j + 1 < order.length && order[j + 1].value === order[i].value) j += 1;
    const averageRank = (i + j) / 2 + 1;
    for (let k = i; k <= j; k += 1) ranks[order[k].index] = averageRank;
    i = j + 1;
  }
  return ranks;
}

export function spearman(xs: number[], ys: number[]): number | null {
  const n = Math.min(xs.length, ys.length);
  if (n < 3) return null;
  return pearson(rank(xs.slice(0, n)), rank(ys.slice(0, n)));
}

export function zScores(values: number[]): number[] {
  const avg = mean(values);
  const sd = stdDev(values);
  if (sd === 0) return values.map(() => 0);
  return values.map((value) => (value - avg) / sd);
}

export type Point2D = [number, number];

function distance(a: Point2D, b: Point2D) {
  return Math.hypot(a[0] - b[0], a[1] - b[1]);
}

/** Scales each axis into [0, 1]; a constant axis maps to 0. */
export function normalizePoints(points: Point2D[]): Point2D[] {
  const xs = points.map((point) => point[0]);
  const ys = points.map((point) => point[1]);
  const [minX, maxX] = [Math.min(...xs), Math.max(...xs)];
  const [minY, maxY] = [Math.min(...ys), Math.max(...ys)];
  const scale = (value: number, min: number, max: number) => (max === min ? 0 : (value - min) / (max - min));
  return points.map(([x, y]) => [scale(x, minX, maxX), scale(y, minY, maxY)]);
}

/** Returns indexes DBSCAN labels as noise. minPts counts the point itself. */
export function dbscanNoise(points: Point2D[], eps: number, minPts: number): number[] {
  const neighbors = points.map((point) =>
    points.map((other, index) => ({ index, d: distance(point, other) })).filter((entry) => entry.d <= eps)
  );
  const core = neighbors.map((list) => list.length >= minPts);
  const labelled = new Array<boolean>(points.length).fill(false);

  for (let i = 0; i < points.length; i += 1) {
    if (!core[i] || labelled[i]) continue;
    const queue = [i];
    labelled[i] = true;
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined || !core[current]) continue;
      for (const { index } of neighbors[current]) {
        if (!labelled[index]) {
          labelled[index] = true;
          queue.push(index);
        }
      }
    }
  }

  return points.map((_, index) => index).filter((index) => !labelled[index]);
}

/** Median distance from each point to its nearest neighbour. */
export function medianNearestDistance(points: Point2D[]): number {
  if (points.length < 2) return 0;
  const nearest = points.map((point, i) =>
    Math.min(...points.filter((_, j) => j !== i).map((other) => distance(point, other)))
  );
  return quantile(nearest, 0.5);
}

/** Local outlier factor for every point with k nearest neighbours. */
export function localOutlierFactors(points: Point2D[], k: number): number[] {
  const knn = points.map((point, i) =>
    points
      .map((other, j) => ({ j, d: distance(point, other) }))
      .filter((entry) => entry.j !== i)
      .sort((a, b) => a.d - b.d)
      .slice(0, k)
  );
  const kDistance = knn.map((list) => list[list.length - 1]?.d ?? 0);
  const lrd = knn.map((list) => {
    const avg = mean(list.map(({ j, d }) => Math.max(kDistance[j], d)));
    return avg === 0 ? Number.POSITIVE_INFINITY : 1 / avg;
  });
  return knn.map((list, i) => {
    if (!Number.isFinite(lrd[i])) return 1;
    const neighbourLrd = list.map(({ j }) => lrd[j]);
    if (neighbourLrd.some((value) => !Number.isFinite(value))) return 1;
    return mean(neighbourLrd) / lrd[i];
  });
}

/**
 * Page-Hinkley test on standardized values, both directions.
 * Returns the index where the detected level shift begins, or null.
 */
export function pageHinkleyChangePoint(
  values: number[],
  options: { delta: number; lambda: number }
): { index: number; direction: "up" | "down" } | null {
  const z = zScores(values);
  let runningSum = 0;
  let upCum = 0;
  let upMin = 0;
  let upMinIndex = 0;
  let downCum = 0;
  let downMax = 0;
  let downMaxIndex = 0;

  for (let t = 0; t < z.length; t += 1) {
    runningSum += z[t];
    const runningMean = runningSum / (t + 1);
    upCum += z[t] - runningMean - options.delta;
    downCum += z[t] - runningMean + options.delta;
    if (upCum < upMin) {
      upMin = upCum;
      upMinIndex = t + 1;
    }
    if (downCum > downMax) {
      downMax = downCum;
      downMaxIndex = t + 1;
    }
    if (upCum - upMin > options.lambda) return { index: upMinIndex, direction: "up" };
    if (downMax - downCum > options.lambda) return { index: downMaxIndex, direction: "down" };
  }
  return null;
}

export function formatNumber(value: number): string {
  if (!Number.isFinite(value)) return String(value);
  return String(Number(value.toFixed(2)));
}
