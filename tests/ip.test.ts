import { headerListElements, resolveAddress, splitHeaderValues, stripPort } from '../src/lib/ip';
import type { RequestView } from '../src/types';

function requestWith(headers: RequestView['headers'], remoteAddress?: string): RequestView {
  return { method: 'GET', path: '/', remoteAddress, headers };
}

describe('identity resolution', () => {
  const xff = requestWith({ 'x-forwarded-for': ['1.1.1.1, 2.2.2.2, 3.3.3.3'] });

  test('selects X-Forwarded-For entries counting from the right', () => {
    expect(resolveAddress(xff, { name: 'X-Forwarded-For', indexFromRight: 0 })).toBe('3.3.3.3');
    expect(resolveAddress(xff, { name: 'X-Forwarded-For', indexFromRight: 1 })).toBe('2.2.2.2');
    expect(resolveAddress(xff, { name: 'X-Forwarded-For', indexFromRight: 2 })).toBe('1.1.1.1');
  });

  test('an index past the list resolves to nothing', () => {
    expect(resolveAddress(xff, { name: 'X-Forwarded-For', indexFromRight: 3 })).toBeUndefined();
    expect(resolveAddress(xff, { name: 'X-Forwarded-For', indexFromRight: 5 })).toBeUndefined();
    expect(resolveAddress(xff, { name: 'X-Forwarded-For', indexFromRight: -1 })).toBeUndefined();
  });

  test('repeated headers are read as one list in arrival order', () => {
    const request = requestWith({ 'x-forwarded-for': ['1.1.1.1', '2.2.2.2'] });
    expect(resolveAddress(request, { name: 'X-Forwarded-For', indexFromRight: 0 })).toBe('2.2.2.2');
    expect(resolveAddress(request, { name: 'X-Forwarded-For', indexFromRight: 1 })).toBe('1.1.1.1');
  });

  test('header names are matched case-insensitively', () => {
    const request = requestWith({ 'x-real-ip': ['9.9.9.9'] });
    expect(resolveAddress(request, { name: 'X-REAL-IP', indexFromRight: 0 })).toBe('9.9.9.9');
  });

  test('any header can carry the identity', () => {
    const request = requestWith({ 'cf-connecting-ip': ['8.8.8.8'], 'x-client-id': ['tenant-7'] });
    expect(resolveAddress(request, { name: 'CF-Connecting-IP', indexFromRight: 0 })).toBe('8.8.8.8');
    expect(resolveAddress(request, { name: 'X-Client-Id', indexFromRight: 0 })).toBe('tenant-7');
  });

  test('a missing or blank header resolves to nothing', () => {
    expect(resolveAddress(requestWith({}), { name: 'X-Forwarded-For', indexFromRight: 0 })).toBeUndefined();
    expect(resolveAddress(requestWith({ 'x-forwarded-for': [' '] }), { name: 'X-Forwarded-For', indexFromRight: 0 })).toBeUndefined();
  });

  test('RemoteAddr uses the peer address without its port', () => {
    const lookup = { name: 'RemoteAddr', indexFromRight: 0 };
    expect(resolveAddress(requestWith({}, '10.0.0.1:5555'), lookup)).toBe('10.0.0.1');
    expect(resolveAddress(requestWith({}, '[::1]:8080'), lookup)).toBe('::1');
    expect(resolveAddress(requestWith({}, '::ffff:127.0.0.1'), lookup)).toBe('::ffff:127.0.0.1');
    expect(resolveAddress(requestWith({}), lookup)).toBeUndefined();
  });

  test('blank list elements keep their position and never resolve', () => {
    const request = requestWith({ 'x-forwarded-for': ['1.1.1.1, , 3.3.3.3'] });
    expect(resolveAddress(request, { name: 'X-Forwarded-For', indexFromRight: 0 })).toBe('3.3.3.3');
    expect(resolveAddress(request, { name: 'X-Forwarded-For', indexFromRight: 1 })).toBeUndefined();
    expect(resolveAddress(request, { name: 'X-Forwarded-For', indexFromRight: 2 })).toBe('1.1.1.1');
    expect(resolveAddress(request, { name: 'X-Forwarded-For', indexFromRight: 3 })).toBeUndefined();
  });

  test('RemoteAddr ignores forwarding headers', () => {
    expect(resolveAddress(requestWith({ 'x-forwarded-for': ['1.1.1.1'] }, '10.0.0.2'))).toBe('10.0.0.2');
  });
});

describe('stripPort', () => {
  test('keeps bare addresses', () => {
    expect(stripPort('192.168.0.1')).toBe('192.168.0.1');
    expect(stripPort('2001:db8::1')).toBe('2001:db8::1');
  });
});

describe('headerListElements', () => {
  test('joins occurrences, splits on commas and keeps blanks in place', () => {
    expect(headerListElements(['a, b', ' c ', ',d,,'])).toEqual(['a', 'b', 'c', '', 'd', '', '']);
    expect(headerListElements(undefined)).toEqual([]);
  });
});

describe('splitHeaderValues', () => {
  test('joins occurrences, splits on commas and drops blanks', () => {
    expect(splitHeaderValues(['a, b', ' c ', ',d,,'])).toEqual(['a', 'b', 'c', 'd']);
    expect(splitHeaderValues(undefined)).toEqual([]);
  });
});
