import { describe, expect, it } from 'vitest';

import { encodeBasicAuth, joinUrl, withQuery } from '@/lib/http/url';

describe('url helpers', () => {
  it('joins without doubling slashes', () => {
    expect(joinUrl('https://pce.example.test:8443/api/v2/orgs/1/', '/workloads')).toBe(
      'https://pce.example.test:8443/api/v2/orgs/1/workloads',
    );
  });

  it('skips absent params and encodes the rest', () => {
    expect(
      withQuery('https://cmdb.example.test/api/now/table/cmdb_ci_server', {
        sysparm_limit: 100,
        sysparm_offset: 0,
        sysparm_query: 'companyLIKEAcme Corp',
        unused: undefined,
      }),
    ).toBe(
      'https://cmdb.example.test/api/now/table/cmdb_ci_server?sysparm_limit=100&sysparm_offset=0&sysparm_query=companyLIKEAcme+Corp',
    );
  });

  it('encodes basic credentials as utf8 base64', () => {
    expect(encodeBasicAuth('user', 'pass')).toBe('dXNlcjpwYXNz');
  });
});
