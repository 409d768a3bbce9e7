import { Dgim } from '../src/core/dgim.js';
import { randomBits } from '../src/utils/stream.js';

function hrMs([s, ns]: [number, number]) { return s * 1000 + ns / 1e6; }

const L = 1_000_000;
const bits = Array.from(randomBits({ length: L, seed: 42 }));

for (const N of [100, 10_000, 1_000_000]) {
  for (const r of [2, 8]) {
    const dgim = new Dgim({ windowSize: N, bucketBound: r });

    const start = process.hrtime();
    for (const b of bits) dgim.update(b);
    const t = hrMs(process.hrtime(start));
    const { bucketCount } = dgim.stats();
    console.log(`N=${N} r=${r}: ${L} updates in ${t.toFixed(2)} ms -> ${(L / (t/1000)).toFixed(0)} ops/sec (buckets=${bucketCount}, estimate=${dgim.estimateCount()})`);
  }
}
