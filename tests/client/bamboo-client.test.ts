import { BambooPermissionClient, FetchFn, connectBambooClient } from '../../src/client/bamboo-client';
import { PermissionServiceError, ServiceConnectionError } from '../../src/domain/errors';

const BASE_URL = 'https://bamboo.example.test';
const API_ROOT = `${BASE_URL}/rest/api/latest/`;

interface SeenRequest {
  method: string;
  path: string;
  authorization: string | null;
  contentType: string | null;
  body: unknown;
}

type Route = () => Response;

/** An in-process stand-in for the server: exact "METHOD path" routes, 404 otherwise. */
function fakeServer(routes: Record<string, Route>): { fetchFn: FetchFn; seen: SeenRequest[] } {
  const seen: SeenRequest[] = [];
  const fetchFn: FetchFn = async (url, init) => {
    const method = init.method ?? 'GET';
    const path = url.startsWith(API_ROOT) ? url.slice(API_ROOT.length) : url;
    const headers = new Headers(init.headers);
    seen.push({
      method,
      path,
      authorization: headers.get('Authorization'),
      contentType: headers.get('Content-Type'),
      body: init.body,
    });
    const route = routes[`${method} ${path}`];
    return route ? route() : new Response('no such route', { status: 404 });
  };
  return { fetchFn, seen };
}

function json(body: unknown): Route {
  return () => new Response(JSON.stringify(body), { status: 200 });
}

const noContent: Route = () => new Response(null, { status: 204 });

const emptyPage = json({ results: [], isLastPage: true });

function client(fetchFn: FetchFn, overrides: Partial<{ token: string; pageSize: number; timeoutMs: number }> = {}) {
  return new BambooPermissionClient({
    baseUrl: `${BASE_URL}/`,
    username: 'admin',
    password: 'test-secret',
    timeoutMs: overrides.timeoutMs ?? 1000,
    pageSize: overrides.pageSize ?? 100,
    token: overrides.token,
    fetchFn,
  });
}

describe('BambooPermissionClient', () => {
  test('lists global grants across pages, users then groups', async () => {
    const server = fakeServer({
      'GET permissions/global/users?start=0&limit=2': json({
        results: [
          { name: 'amy', permissions: ['VIEW', 'BUILD'] },
          { name: 'bob', permissions: ['VIEW'] },
        ],
        isLastPage: false,
      }),
      'GET permissions/global/users?start=2&limit=2': json({
        results: [{ name: 'cat', permissions: ['ADMINISTER'] }],
        isLastPage: true,
      }),
      'GET permissions/global/groups?start=0&limit=2': json({
        results: [{ name: 'devs', permissions: ['VIEW'] }],
        isLastPage: true,
      }),
    });

    const entries = await client(server.fetchFn, { pageSize: 2 }).getGlobalPermissions();

    expect(entries).toEqual([
      { type: 'USER', name: 'amy', permission: 'VIEW' },
      { type: 'USER', name: 'amy', permission: 'BUILD' },
      { type: 'USER', name: 'bob', permission: 'VIEW' },
      { type: 'USER', name: 'cat', permission: 'ADMINISTER' },
      { type: 'GROUP', name: 'devs', permission: 'VIEW' },
    ]);
    expect(server.seen.map((request) => request.path)).toEqual([
      'permissions/global/users?start=0&limit=2',
      'permissions/global/users?start=2&limit=2',
      'permissions/global/groups?start=0&limit=2',
    ]);
  });

  test('sends basic credentials', async () => {
    const server = fakeServer({ 'GET currentUser': json({ name: 'admin' }) });
    await client(server.fetchFn).ping();
    expect(server.seen[0].authorization).toBe(`Basic ${Buffer.from('admin:test-secret').toString('base64')}`);
  });

  test('a token takes precedence over basic credentials', async () => {
    const server = fakeServer({ 'GET currentUser': json({ name: 'admin' }) });
    await client(server.fetchFn, { token: 'test-token' }).ping();
    expect(server.seen[0].authorization).toBe('Bearer test-token');
  });

  test('discovers plans before listing their grants', async () => {
    const server = fakeServer({
      'GET plan?start-index=0&max-result=100': json({
        plans: { size: 1, plan: [{ projectKey: 'CORE', shortKey: 'API', key: 'CORE-API' }] },
      }),
      'GET permissions/plan/CORE-API/users?start=0&limit=100': json({
        results: [{ name: 'jdoe', permissions: ['VIEW'] }],
        isLastPage: true,
      }),
      'GET permissions/plan/CORE-API/groups?start=0&limit=100': emptyPage,
    });

    expect(await client(server.fetchFn).getBuildPlanPermissions()).toEqual([
      { type: 'USER', name: 'jdoe', permission: 'VIEW', projectKey: 'CORE', planKey: 'API' },
    ]);
  });

  test('lists project grants for every discovered project', async () => {
    const server = fakeServer({
      'GET project?start-index=0&max-result=100': json({ projects: { size: 2, project: [{ key: 'CORE' }, { key: 'WEB' }] } }),
      'GET permissions/project/CORE/users?start=0&limit=100': emptyPage,
      'GET permissions/project/CORE/groups?start=0&limit=100': json({
        results: [{ name: 'developers', permissions: ['CREATEPLAN'] }],
        isLastPage: true,
      }),
      'GET permissions/project/WEB/users?start=0&limit=100': emptyPage,
      'GET permissions/project/WEB/groups?start=0&limit=100': emptyPage,
    });

    expect(await client(server.fetchFn).getProjectPermissions()).toEqual([
      { type: 'GROUP', name: 'developers', permission: 'CREATEPLAN', projectKey: 'CORE' },
    ]);
  });

  test('lists deployment project and environment grants with string ids', async () => {
    const server = fakeServer({
      'GET deploy/project/all': json([{ id: 65537, name: 'Web', environments: [{ id: 98305, name: 'Prod' }] }]),
      'GET permissions/deployment/65537/users?start=0&limit=100': json({
        results: [{ name: 'deployer', permissions: ['EDIT'] }],
        isLastPage: true,
      }),
      'GET permissions/deployment/65537/groups?start=0&limit=100': emptyPage,
      'GET permissions/environment/98305/users?start=0&limit=100': emptyPage,
      'GET permissions/environment/98305/groups?start=0&limit=100': json({
        results: [{ name: 'release-managers', permissions: ['DEPLOY'] }],
        isLastPage: true,
      }),
    });
    const bamboo = client(server.fetchFn);

    expect(await bamboo.getDeploymentProjectPermissions()).toEqual([
      { type: 'USER', name: 'deployer', permission: 'EDIT', projectKey: '65537' },
    ]);
    expect(await bamboo.getDeploymentEnvironmentPermissions()).toEqual([
      { type: 'GROUP', name: 'release-managers', permission: 'DEPLOY', projectKey: '65537', environmentId: '98305' },
    ]);
  });

  test('grants with PUT and revokes with DELETE, one permission per call', async () => {
    const server = fakeServer({
      'PUT permissions/plan/CORE-API/users/jdoe': noContent,
      'DELETE permissions/environment/98305/groups/release%20managers': noContent,
    });
    const bamboo = client(server.fetchFn);

    await bamboo.addBuildPlanPermission('BUILD', 'USER', 'jdoe', 'CORE', 'API');
    await bamboo.removeDeploymentEnvironmentPermission('DEPLOY', 'GROUP', 'release managers', '65537', '98305');

    expect(server.seen).toEqual([
      {
        method: 'PUT',
        path: 'permissions/plan/CORE-API/users/jdoe',
        authorization: expect.any(String),
        contentType: 'application/json',
        body: '["BUILD"]',
      },
      {
        method: 'DELETE',
        path: 'permissions/environment/98305/groups/release%20managers',
        authorization: expect.any(String),
        contentType: 'application/json',
        body: '["DEPLOY"]',
      },
    ]);
  });

  test('an error status becomes a PermissionServiceError carrying it', async () => {
    const server = fakeServer({
      'PUT permissions/global/users/jdoe': () => new Response('forbidden', { status: 403 }),
    });

    const failure = client(server.fetchFn).addGlobalPermission('ADMINISTER', 'USER', 'jdoe');

    await expect(failure).rejects.toBeInstanceOf(PermissionServiceError);
    await expect(failure).rejects.toMatchObject({
      status: 403,
      message: 'PUT permissions/global/users/jdoe returned HTTP 403: forbidden',
      typedError: { code: 'SERVICE.HTTP_403', retryable: false },
    });
  });

  test('a request that times out says so', async () => {
    const fetchFn: FetchFn = async () => {
      throw Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
    };

    await expect(client(fetchFn, { timeoutMs: 50 }).getDeploymentPermissions()).rejects.toThrow(
      'GET permissions/deployment/users?start=0&limit=100 timed out after 50ms',
    );
  });

  test('a deployment listing that is not an array is rejected', async () => {
    const server = fakeServer({ 'GET deploy/project/all': json({ size: 0 }) });
    await expect(client(server.fetchFn).getDeploymentProjectPermissions()).rejects.toThrow(
      'Unexpected deployment project listing: expected an array',
    );
  });

  test('a closed client refuses requests', async () => {
    const server = fakeServer({});
    const bamboo = client(server.fetchFn);
    await bamboo.close();

    await expect(bamboo.getGlobalPermissions()).rejects.toThrow('Connection is closed');
    expect(server.seen).toEqual([]);
  });
});

describe('connectBambooClient', () => {
  test('returns a client once the server answers', async () => {
    const server = fakeServer({ 'GET currentUser': json({ name: 'admin' }) });
    const connected = await connectBambooClient({
      baseUrl: BASE_URL,
      username: 'admin',
      password: 'test-secret',
      timeoutMs: 1000,
      pageSize: 100,
      fetchFn: server.fetchFn,
    });
    expect(connected).toBeInstanceOf(BambooPermissionClient);
  });

  test('rejected credentials are a connection failure', async () => {
    const server = fakeServer({ 'GET currentUser': () => new Response('nope', { status: 401 }) });
    const attempt = connectBambooClient({ baseUrl: BASE_URL, timeoutMs: 1000, pageSize: 100, fetchFn: server.fetchFn });

    await expect(attempt).rejects.toBeInstanceOf(ServiceConnectionError);
    await expect(attempt).rejects.toThrow(
      `Cannot connect to permission service at ${BASE_URL}: GET currentUser returned HTTP 401: nope`,
    );
  });

  test('an unreachable server is a connection failure', async () => {
    const fetchFn: FetchFn = async () => {
      throw new TypeError('fetch failed');
    };
    await expect(connectBambooClient({ baseUrl: BASE_URL, timeoutMs: 1000, pageSize: 100, fetchFn })).rejects.toMatchObject({
      typedError: { code: 'SERVICE.UNREACHABLE' },
    });
  });
});
