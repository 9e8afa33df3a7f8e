import { describe, it, expect } from 'vitest';
import { classifyEndpoint } from '../../src/modules/endpointClassifier.js';

describe('classifyEndpoint', () => {
  it.each([
    'http://x.test/api/users?action=list',
    'http://x.test/API/v1',
    'http://x.test/data.json',
    'http://x.test/feed.xml',
    'http://x.test/index.php',
    'http://x.test/handler.ashx',
    'http://x.test/login.do',
    'http://x.test/ws/feed',
    'http://x.test/rest/items',
    'http://x.test/cgi-bin/run.cgi',
    'http://x.test/page?method=save',
    'http://x.test/search?API_KEY=test-key',
  ])('classifies %s as backend', (url) => {
    expect(classifyEndpoint(url)).toBe('backend');
  });

  it.each([
    'http://x.test/about.html',
    'http://x.test/old.htm',
    'http://x.test/page.aspx',
    'http://x.test/default.asp?x=1',
    'http://x.test/report.cfm',
    'http://x.test/contact',
    'http://x.test/docs/getting-started',
  ])('classifies %s as html', (url) => {
    expect(classifyEndpoint(url)).toBe('html');
  });

  it.each([
    'http://x.test/',
    'http://x.test/docs/',
    'http://x.test/app.js',
    'http://x.test/logo.png',
    'not-a-url',
  ])('classifies %s as unknown', (url) => {
    expect(classifyEndpoint(url)).toBe('unknown');
  });

  it('lets backend rules win over page rules', () => {
    expect(classifyEndpoint('http://x.test/api/index.html')).toBe('backend');
    expect(classifyEndpoint('http://x.test/view.aspx?action=delete')).toBe('backend');
  });

  it('matches rules against the whole URL', () => {
    expect(classifyEndpoint('http://data.json.test/about')).toBe('backend');
    expect(classifyEndpoint('http://x.test/?q=1')).toBe('html');
    expect(classifyEndpoint('http://x.test/list?page=2')).toBe('html');
  });
});
