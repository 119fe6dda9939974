import { Breadcrumb } from './breadcrumb';
import { PreconditionError } from './errors';
import { describeException, Event } from './event';
import { SeverityLevel } from './severity';
import { User } from './user';

const sdk = { name: 'stackwire.node', version: '1.0.0' };

describe('Event', () => {
  it('should serialize only protocol fields when nothing is set', () => {
    expect(new Event().toJson()).toEqual({ platform: 'node', sdk });
  });

  it('should omit empty maps and lists', () => {
    const json = new Event({
      message: 'boom',
      tags: {},
      extra: {},
      fingerprint: [],
      breadcrumbs: [],
    }).toJson();

    expect(JSON.stringify(json)).toContain('"message":"boom"');
    expect(Object.keys(json)).toEqual(['platform', 'sdk', 'message']);
  });

  it('should serialize every field under its wire name', () => {
    const event = new Event({
      loggerName: 'checkout',
      serverName: 'web-1',
      release: '1.2.3',
      environment: 'staging',
      message: 'payment failed',
      transaction: '/orders/<id>/',
      exception: { type: 'PaymentError', value: 'card declined' },
      stackTrace: '    at pay (/app/src/pay.js:12:7)',
      level: SeverityLevel.error,
      culprit: 'pay.js in pay',
      tags: { region: 'eu' },
      extra: { attempt: 2, cart: { items: 3 } },
      fingerprint: [Event.DEFAULT_FINGERPRINT, 'payments'],
      userContext: new User({ id: 'u-1', email: 'user@example.com' }),
      breadcrumbs: [
        new Breadcrumb('second', new Date(Date.UTC(2024, 0, 1, 0, 0, 2))),
        new Breadcrumb('first', new Date(Date.UTC(2024, 0, 1, 0, 0, 1))),
      ],
    });

    expect(event.toJson()).toEqual({
      platform: 'node',
      sdk,
      logger: 'checkout',
      server_name: 'web-1',
      release: '1.2.3',
      environment: 'staging',
      message: 'payment failed',
      transaction: '/orders/<id>/',
      exception: [{ type: 'PaymentError', value: 'card declined' }],
      stacktrace: {
        frames: [
          {
            abs_path: '/app/src/pay.js',
            filename: 'pay.js',
            function: 'pay',
            lineno: 12,
            colno: 7,
            in_app: true,
          },
        ],
      },
      level: 'error',
      culprit: 'pay.js in pay',
      tags: { region: 'eu' },
      extra: { attempt: 2, cart: { items: 3 } },
      user: { id: 'u-1', email: 'user@example.com' },
      fingerprint: ['{{ default }}', 'payments'],
      breadcrumbs: {
        values: [
          { timestamp: '2024-01-01T00:00:02', message: 'second', level: 'info' },
          { timestamp: '2024-01-01T00:00:01', message: 'first', level: 'info' },
        ],
      },
    });
  });

  it('should pass the frame filter to the stack trace', () => {
    const json = new Event({ stackTrace: '    at pay (/app/src/pay.js:12:7)' }).toJson({
      stackFrameFilter: () => [],
    });

    expect(json.stacktrace).toEqual({ frames: [] });
  });

  it('should not change when the caller mutates its inputs', () => {
    const tags: Record<string, string> = { region: 'eu' };
    const fingerprint = ['a'];
    const event = new Event({ tags, fingerprint });

    tags['region'] = 'us';
    fingerprint.push('b');

    expect(event.toJson()).toMatchObject({ tags: { region: 'eu' }, fingerprint: ['a'] });
    expect(Object.isFrozen(event)).toBe(true);
  });
});

describe('User', () => {
  it('should require an id or an IP address', () => {
    expect(() => new User({ username: 'nobody' })).toThrow(PreconditionError);
    expect(() => new User({ ipAddress: '127.0.0.1' })).not.toThrow();
  });

  it('should serialize present fields only', () => {
    const user = new User({
      id: 'u-1',
      ipAddress: '10.0.0.1',
      extras: { plan: 'basic' },
    });

    expect(user.toJson()).toEqual({ id: 'u-1', ip_address: '10.0.0.1', extras: { plan: 'basic' } });
  });
});

describe('Breadcrumb', () => {
  it('should serialize with second precision and default info level', () => {
    const breadcrumb = new Breadcrumb('clicked', new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 678)), {
      category: 'ui.click',
      data: { id: 'buy-button' },
      type: 'default',
    });

    expect(breadcrumb.toJson()).toEqual({
      timestamp: '2024-01-02T03:04:05',
      message: 'clicked',
      category: 'ui.click',
      data: { id: 'buy-button' },
      level: 'info',
      type: 'default',
    });
  });

  it('should omit empty data and keep an explicit level', () => {
    const breadcrumb = new Breadcrumb(undefined, new Date(Date.UTC(2024, 0, 2)), {
      data: {},
      level: SeverityLevel.warning,
    });

    expect(breadcrumb.toJson()).toEqual({ timestamp: '2024-01-02T00:00:00', level: 'warning' });
  });

  it('should require a valid timestamp', () => {
    expect(() => new Breadcrumb('x', new Date('not a date'))).toThrow(PreconditionError);
  });
});

describe('describeException', () => {
  it('should use name and message of an Error', () => {
    expect(describeException(new TypeError('bad input'))).toEqual({
      type: 'TypeError',
      value: 'bad input',
    });
  });

  it('should use the constructor name and string form of other objects', () => {
    class QuotaExceeded {
      toString(): string {
        return 'quota of 10 exceeded';
      }
    }

    expect(describeException(new QuotaExceeded())).toEqual({
      type: 'QuotaExceeded',
      value: 'quota of 10 exceeded',
    });
  });

  it('should use typeof for primitives', () => {
    expect(describeException('oops')).toEqual({ type: 'string', value: 'oops' });
    expect(describeException(42)).toEqual({ type: 'number', value: '42' });
    expect(describeException(null)).toEqual({ type: 'null', value: 'null' });
  });
});
