/**
 * Benchmark comparing bit-packed records against JSON.
 *
 * Run with: npm run bench
 */

import { run, bench, group, summary } from 'mitata';
import {
  Decoder,
  Encoder,
  bool,
  decode,
  defineStructure,
  encode,
  float64,
  int32,
  short,
  string,
  type Infer,
} from '../src';

// ============================================================================
// Record definitions
// ============================================================================

const Point = defineStructure('Point', {
  x: float64(),
  y: float64(),
});
type Point = Infer<typeof Point>;

const Reading = defineStructure('Reading', {
  sensor: int32('VarInt'),
  delta: int32('VarUInt'),
  channel: short(),
  label: string(),
  calibrated: bool(),
  stale: bool(),
  value: float64(),
});
type Reading = Infer<typeof Reading>;

// ============================================================================
// Test data
// ============================================================================

const testPoint: Point = {
  x: 42.5,
  y: -17.25,
};

const testReading: Reading = {
  sensor: 1042,
  delta: -7,
  channel: 3,
  label: 'north-east intake',
  calibrated: true,
  stale: false,
  value: 21.375,
};

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

const packedPointBytes = encode(Point, testPoint);
const packedReadingBytes = encode(Reading, testReading);
const jsonPointBytes = textEncoder.encode(JSON.stringify(testPoint));
const jsonReadingBytes = textEncoder.encode(JSON.stringify(testReading));

// ============================================================================
// Benchmarks
// ============================================================================

console.log('Buffer sizes comparison:');
console.log('  Point:');
console.log(`    bitpacked: ${packedPointBytes.length} bytes`);
console.log(`    json:      ${jsonPointBytes.length} bytes`);
console.log('  Reading:');
console.log(`    bitpacked: ${packedReadingBytes.length} bytes`);
console.log(`    json:      ${jsonReadingBytes.length} bytes`);
console.log('');

summary(() => {
  group('Point decode', () => {
    bench('JSON (bytes)', () => {
      JSON.parse(textDecoder.decode(jsonPointBytes));
    });

    bench('bitpacked', () => {
      decode(Point, packedPointBytes);
    }).baseline();
  });
});

summary(() => {
  group('Point encode', () => {
    bench('JSON (to bytes)', () => {
      textEncoder.encode(JSON.stringify(testPoint));
    });

    bench('bitpacked', () => {
      encode(Point, testPoint);
    }).baseline();
  });
});

summary(() => {
  group('Reading decode', () => {
    bench('JSON (bytes)', () => {
      JSON.parse(textDecoder.decode(jsonReadingBytes));
    });

    bench('bitpacked', () => {
      decode(Reading, packedReadingBytes);
    }).baseline();

    bench('bitpacked (engine, two fields)', () => {
      const decoder = new Decoder(packedReadingBytes);
      const session = decoder.beginStructure(Reading.structure);
      decoder.readScalarField(session, 0);
      decoder.readBooleanField(session, 4);
      decoder.endStructure(session);
    });
  });
});

summary(() => {
  group('Reading encode', () => {
    bench('JSON (to bytes)', () => {
      textEncoder.encode(JSON.stringify(testReading));
    });

    bench('bitpacked', () => {
      encode(Reading, testReading);
    }).baseline();

    const encoder = new Encoder({ initialCapacity: 64 });
    bench('bitpacked (reused engine)', () => {
      const session = encoder.beginStructure(Reading.structure);
      encoder.writeScalarField(session, 0, testReading.sensor);
      encoder.writeScalarField(session, 1, testReading.delta);
      encoder.writeScalarField(session, 2, testReading.channel);
      encoder.writeScalarField(session, 3, testReading.label);
      encoder.setBooleanField(session, 4, testReading.calibrated);
      encoder.setBooleanField(session, 5, testReading.stale);
      encoder.writeScalarField(session, 6, testReading.value);
      encoder.endStructure(session);
    }).gc('inner');
  });
});

await run();
