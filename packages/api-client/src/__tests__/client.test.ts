// ---------------------------------------------------------------------------
// ManagedDbHttpClient Tests: in-process fetch stub
// ---------------------------------------------------------------------------

import { ApiError, NotFoundError, TransportError } from "@dbplane/core";
import { ManagedDbHttpClient } from "../client";
import type { ManagedDbClientOptions } from "../client";
import { ErrorTransformerInterceptor } from "../interceptors/error-transformer";
import { LoggerInterceptor } from "../interceptors/logger";
import type { ClusterData } from "../protocol";

// ---- Helpers --------------------------------------------------------------

const BASE = "https://api.test/api/public/v1/accounts/acc-1/projects/proj-1";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function createClient(
  respond: (url: string, init: RequestInit) => Promise<Response>,
  overrides?: Partial<ManagedDbClientOptions>,
) {
  const fetchFn = jest.fn(respond);
  const client = new ManagedDbHttpClient({
    baseUrl: "https://api.test/",
    apiToken: "test-token",
    accountId: "acc-1",
    projectId: "proj-1",
    fetchFn,
    ...overrides,
  });
  return { client, fetchFn };
}

const clusterData: ClusterData = {
  info: {
    id: "c-1",
    state: "ACTIVE",
    software_version: "2.20.1",
    is_connection_pooling_enabled: false,
    metadata: { created_on: "2024-01-01T00:00:00Z", updated_on: null },
    cluster_endpoints: [],
  },
  spec: {
    name: "orders",
    cluster_info: {
      cluster_tier: "PAID",
      num_nodes: 3,
      fault_tolerance: "ZONE",
      num_faults_to_tolerate: 1,
      is_production: true,
      cluster_type: "SYNCHRONOUS",
      version: 4,
      node_info: { num_cores: 2, memory_mb: 8192, disk_size_gb: 50, disk_iops: null },
    },
    software_info: { track_id: "track-1" },
    cluster_region_info: [
      {
        placement_info: {
          cloud_info: { code: "AWS", region: "us-east-1" },
          num_nodes: 3,
          vpc_id: null,
          multi_zone: false,
        },
        node_info: null,
        accessibility_types: ["PUBLIC"],
        is_default: true,
        is_affinitized: false,
      },
    ],
  },
};

// ---- Success paths ----------------------------------------------------------

describe("ManagedDbHttpClient", () => {
  it("reads a cluster from the scoped path with a bearer token", async () => {
    const { client, fetchFn } = createClient(async () => jsonResponse({ data: clusterData }));

    const result = await client.getCluster("c-1");

    expect(result).toEqual(clusterData);
    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe(`${BASE}/clusters/c-1`);
    expect(init.method).toBe("GET");
    expect(init.headers).toEqual({
      Accept: "application/json",
      Authorization: "Bearer test-token",
    });
    expect(init.body).toBeUndefined();
  });

  it("sends JSON bodies with a content type", async () => {
    const vpc = {
      info: { id: "vpc-1", state: "CREATING", external_vpc_id: null },
      spec: { name: "net", cloud: "GCP", parent_cidr: "10.0.0.0/16", region_specs: null },
    };
    const { client, fetchFn } = createClient(async () => jsonResponse({ data: vpc }));

    await client.createVpc({ name: "net", cloud: "GCP", parent_cidr: "10.0.0.0/16" });

    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe(`${BASE}/vpcs`);
    expect(init.method).toBe("POST");
    expect(init.body).toBe(JSON.stringify({ name: "net", cloud: "GCP", parent_cidr: "10.0.0.0/16" }));
    expect(init.headers).toMatchObject({ "Content-Type": "application/json" });
  });

  it("encodes the task query string", async () => {
    const { client, fetchFn } = createClient(async () => jsonResponse({ data: [] }));

    const tasks = await client.listTasks({ entityId: "c-1", entityType: "CLUSTER", taskType: "EDIT_CLUSTER" });

    expect(tasks).toEqual([]);
    expect(fetchFn.mock.calls[0][0]).toBe(
      `${BASE}/tasks?entity_id=c-1&entity_type=CLUSTER&task_type=EDIT_CLUSTER&limit=1`,
    );
  });

  it("percent-encodes ids in the path", async () => {
    const { client, fetchFn } = createClient(async () => jsonResponse({ data: clusterData }));

    await client.getCluster("c 1/../x");

    expect(fetchFn.mock.calls[0][0]).toBe(`${BASE}/clusters/c%201%2F..%2Fx`);
  });

  it("reads tracks from the account scope", async () => {
    const tracks = [{ info: { id: "t-1" }, spec: { name: "Production" } }];
    const { client, fetchFn } = createClient(async () => jsonResponse({ data: tracks }));

    expect(await client.listTracks()).toEqual(tracks);
    expect(fetchFn.mock.calls[0][0]).toBe("https://api.test/api/public/v1/accounts/acc-1/software/tracks");
  });

  it("selects node configurations for the requested region", async () => {
    const configs = {
      "us-east-1": [{ num_cores: 2, memory_mb: 8192, include_disk_size_gb: 50 }],
    };
    const { client } = createClient(async () => jsonResponse({ data: configs }));

    const east = await client.getNodeConfigurations({ cloud: "AWS", tier: "PAID", region: "us-east-1" });
    const west = await client.getNodeConfigurations({ cloud: "AWS", tier: "PAID", region: "us-west-2" });

    expect(east).toEqual([{ num_cores: 2, memory_mb: 8192, include_disk_size_gb: 50 }]);
    expect(west).toEqual([]);
  });

  it("resolves void requests with an empty body", async () => {
    const { client, fetchFn } = createClient(async () => new Response(null, { status: 204 }));

    await expect(client.deleteCluster("c-1")).resolves.toBeUndefined();
    expect(fetchFn.mock.calls[0][1].method).toBe("DELETE");
  });

  // ---- Failure paths --------------------------------------------------------

  it("rejects 404 with NotFoundError carrying the id", async () => {
    const { client } = createClient(async () =>
      jsonResponse({ error: { detail: "Cluster not found", status: 404 } }, 404),
    );

    const err = await client.getCluster("c-1").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(NotFoundError);
    expect(err).toMatchObject({ message: "Cluster not found", resourceId: "c-1" });
  });

  it("rejects 5xx with a retryable ApiError titled by the operation", async () => {
    const { client } = createClient(async () =>
      jsonResponse({ error: { detail: "Service busy" } }, 503),
    );

    const err = await client.getCluster("c-1").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ApiError);
    expect(err).toMatchObject({
      message: "Service busy",
      status: 503,
      kind: "RETRYABLE",
      title: "Could not read cluster",
    });
  });

  it("rejects 400 with a fatal ApiError", async () => {
    const { client } = createClient(async () =>
      jsonResponse({ error: { detail: "Invalid cluster name" } }, 400),
    );

    const err = await client.createCluster({
      cluster_spec: clusterData.spec,
      db_credentials: {
        ysql: { username: "admin", password: "test-secret" },
        ycql: { username: "admin", password: "test-secret" },
      },
    }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ApiError);
    expect(err).toMatchObject({ status: 400, kind: "FATAL", title: "Could not create cluster" });
  });

  it("wraps connection failures in a retryable TransportError", async () => {
    const { client } = createClient(async () => {
      const cause = Object.assign(new Error("read ECONNRESET"), { code: "ECONNRESET" });
      throw new TypeError("fetch failed", { cause });
    });

    const err = await client.getVpc("vpc-1").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({
      message: "fetch failed (ECONNRESET)",
      retryable: true,
      title: "Could not read VPC",
    });
  });

  it("cancels a request in flight when the caller aborts", async () => {
    const { client } = createClient(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init.signal?.addEventListener("abort", () => reject(init.signal?.reason), { once: true });
        }),
    );
    const controller = new AbortController();

    const pending = client.getCluster("c-1", { signal: controller.signal }).catch((e: unknown) => e);
    controller.abort();
    const err = await pending;

    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({
      message: expect.stringMatching(/^Request was cancelled: /),
      retryable: false,
      title: "Could not read cluster",
    });
  });

  it("rejects responses that do not match the expected shape", async () => {
    const { client } = createClient(async () => jsonResponse({ data: { info: {} } }));

    const err = await client.getBackup("b-1").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ApiError);
    expect(err).toMatchObject({ kind: "FATAL", status: 200 });
    expect(err instanceof ApiError && err.message.startsWith(`Unexpected response to GET /api/public/v1/`)).toBe(true);
  });

  it("rejects bodies that are not JSON", async () => {
    const { client } = createClient(async () => new Response("<html>ok</html>", { status: 200 }));

    await expect(client.getBackup("b-1")).rejects.toThrow(
      "Response to GET /api/public/v1/accounts/acc-1/projects/proj-1/backups/b-1 is not valid JSON",
    );
  });

  // ---- Interceptors ---------------------------------------------------------

  it("fills an empty 401 through the error transformer", async () => {
    const { client } = createClient(async () => new Response("", { status: 401 }), {
      interceptors: [new ErrorTransformerInterceptor()],
    });

    await expect(client.listVpcs()).rejects.toMatchObject({
      message: "Authentication failed. Check that the API token is valid and has not expired.",
      status: 401,
      kind: "FATAL",
    });
  });

  it("logs traffic through a registered logger", async () => {
    const lines: string[] = [];
    const { client } = createClient(async () => jsonResponse({ data: clusterData }));
    client.use(new LoggerInterceptor({ logFn: (message) => lines.push(message) }));

    await client.getCluster("c-1");

    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\[API:OUT\] GET \/api\/public\/v1\/accounts\/acc-1\/projects\/proj-1\/clusters\/c-1 id=/);
    expect(lines[1]).toMatch(/^\[API:IN\] id=.* status=200 duration=\d+ms$/);
  });

  it("reports transport failures to interceptors", async () => {
    const onError = jest.fn(async () => undefined);
    const { client } = createClient(async () => {
      throw new TypeError("fetch failed");
    }, { interceptors: [{ name: "spy", onError }] });

    await expect(client.getCluster("c-1")).rejects.toBeInstanceOf(TransportError);
    expect(onError).toHaveBeenCalledTimes(1);
  });
});
