import { describe, expect, it } from 'vitest';

import { schema } from '../../schema/builders.js';
import { SchemaCache } from '../../schema/schema-cache.js';
import { ConfigError } from '../../types/errors.js';
import { MetricsCollector } from '../../util/metrics.js';
import { FormCodec } from '../form-codec.js';
import { expectOk } from '../../../../../test/helpers/result-assertions.js';

const Login = schema.record('Login', {
  user: schema.string(),
  remember: schema.field(schema.bool(), 'remember,omitempty'),
});

describe('FormCodec', () => {
  it('resolves options over the defaults', () => {
    const codec = new FormCodec({ sortKeys: false, guards: { maxPairs: 5 } });

    expect(codec.options).toEqual({
      trimInput: true,
      sortKeys: false,
      guards: { maxInputBytes: 1_048_576, maxPairs: 5, maxPathDepth: 32 },
    });
  });

  it('throws ConfigError for invalid options', () => {
    expect(() => new FormCodec({ guards: { maxPathDepth: 0 } })).toThrow(
      ConfigError
    );
  });

  it('trims surrounding whitespace unless told not to', () => {
    expect(expectOk(new FormCodec().parse('  user=a \n'))).toEqual([
      { key: 'user', value: 'a' },
    ]);
    expect(expectOk(new FormCodec({ trimInput: false }).parse(' user=a '))).toEqual([
      { key: ' user', value: 'a ' },
    ]);
  });

  it('shares one cache across calls', () => {
    const cache = new SchemaCache();
    const codec = new FormCodec({}, cache);

    expectOk(codec.decode('user=a', Login));
    expectOk(codec.decode('user=b', Login));

    expect(cache.has(Login)).toBe(true);
    expect(cache.getStats().misses).toBe(1);
  });

  it('records counters and phase timings', () => {
    let now = 0;
    const metrics = new MetricsCollector({
      now: () => {
        now += 1;
        return now;
      },
    });
    const codec = new FormCodec();

    expectOk(codec.decode('user=a&remember=true', Login, { metrics }));
    expectOk(codec.encode({ user: 'a', remember: true }, Login, { metrics }));

    const snapshot = metrics.snapshotMetrics();
    expect(snapshot.pairsDecoded).toBe(2);
    expect(snapshot.pairsEncoded).toBe(2);
    expect(snapshot.schemaCacheMisses).toBe(1);
    expect(snapshot.parseMs).toBe(1);
    expect(snapshot.decodeMs).toBe(1);
    expect(snapshot.encodeMs).toBe(1);
    expect(snapshot.serializeMs).toBe(1);
  });

  it('leaves a disabled collector untouched', () => {
    const metrics = new MetricsCollector({ enabled: false });

    expectOk(new FormCodec().decode('user=a', Login, { metrics }));

    expect(metrics.snapshotMetrics().pairsDecoded).toBe(0);
  });
});
