import { HttpMethod, QueryOptions, QueryRequest } from '../types/index.js';

type ParamValue = string | number | readonly string[] | undefined;
type QueryParams = Record<string, ParamValue>;

export interface QueryDescriptor {
  method: HttpMethod;
  // `{site}` is replaced with the encoded site name
  path: string;
  resource?: (options: QueryOptions) => string | undefined;
  params?: (options: QueryOptions, now: number) => QueryParams;
  body?: Record<string, unknown>;
}

export const QUERY_NAMES = [
  'list_clients',
  'list_online_clients',
  'list_guests',
  'list_users',
  'list_user_groups',
  'stat_all_users',
  'stat_authorizations',
  'stat_sessions',
  'list_devices',
  'list_wlan_groups',
  'list_rouge_access_points',
  'list_rogue_access_points',
  'list_known_rogue_access_points',
  'list_tags',
  'five_minute_site_stats',
  'hourly_site_stats',
  'daily_site_stats',
  'all_sites_stats',
  'five_minute_access_point_stats',
  'hourly_access_point_stats',
  'daily_access_point_stats',
  'five_minute_site_dashboard_metrics',
  'hourly_site_dashboard_metrics',
  'site_health_metrics',
  'port_forwarding_stats',
  'dpi_stats',
  'stat_vouchers',
  'stat_payments',
  'list_hotspot_operators',
  'list_sites',
  'sysinfo',
  'list_site_settings',
  'list_admins_for_current_site',
  'list_admins_for_all_sites',
  'list_wlan_configuration',
  'list_current_channels',
  'list_voip_extensions',
  'list_network_configuration',
  'list_port_configuration',
  'list_port_forwarding_rules',
  'list_firewall_groups',
  'dynamic_dns_configuration',
  'list_country_codes',
  'list_auto_backups',
  'list_radius_profiles',
  'list_radius_accounts',
  'list_alarms',
  'list_events',
] as const;

export type QueryName = (typeof QUERY_NAMES)[number];

export const DEFAULT_QUERY: QueryName = 'list_sites';

// ============================================================================
// Parameter Helpers
// ============================================================================

const HOUR_MS = 3600 * 1000;
const DAY_MS = 24 * HOUR_MS;
const WEEK_SECONDS = 7 * 24 * 3600;

const SITE_REPORT_ATTRS = [
  'bytes',
  'wan-tx_bytes',
  'wan-rx_bytes',
  'wlan_bytes',
  'num_sta',
  'lan-num_sta',
  'wlan-num_sta',
  'time',
] as const;

const AP_REPORT_ATTRS = ['bytes', 'num_sta', 'time'] as const;

const mac = (value?: string) => value?.trim().toLowerCase() || undefined;
const id = (value?: string) => value?.trim() || undefined;

// Session and authorization history is addressed in seconds
function secondsWindow(options: QueryOptions, now: number) {
  const end = options.endEpoch ?? Math.floor(now / 1000);
  const start = options.startEpoch ?? end - WEEK_SECONDS;
  return { start, end };
}

// Report endpoints take milliseconds
function millisWindow(options: QueryOptions, now: number, spanMs: number) {
  const end = options.endEpoch ?? now;
  const start = options.startEpoch ?? end - spanMs;
  return { start, end };
}

const get = (path: string, extra: Omit<QueryDescriptor, 'method' | 'path'> = {}): QueryDescriptor => ({
  method: 'GET',
  path,
  ...extra,
});

const command = (path: string, cmd: string): QueryDescriptor => ({
  method: 'POST',
  path,
  body: { cmd },
});

const within = (fallbackHours?: number) => (options: QueryOptions): QueryParams => ({
  within: options.since ?? fallbackHours,
});

function siteReport(interval: '5minutes' | 'hourly' | 'daily', spanMs: number): QueryDescriptor {
  return get(`/api/s/{site}/stat/report/${interval}.site`, {
    params: (options, now) => ({
      attrs: SITE_REPORT_ATTRS,
      ...millisWindow(options, now, spanMs),
    }),
  });
}

function accessPointReport(interval: '5minutes' | 'hourly' | 'daily', spanMs: number): QueryDescriptor {
  return get(`/api/s/{site}/stat/report/${interval}.ap`, {
    params: (options, now) => ({
      ...millisWindow(options, now, spanMs),
      attrs: AP_REPORT_ATTRS,
      mac: mac(options.deviceMac),
    }),
  });
}

// ============================================================================
// Query Table
// ============================================================================

const onlineClients = get('/api/s/{site}/stat/sta', { resource: (o) => mac(o.clientMac) });
const rogueAccessPoints = get('/api/s/{site}/stat/rogueap', { params: within(24) });

export const QUERIES: Record<QueryName, QueryDescriptor> = {
  list_clients: onlineClients,
  list_online_clients: onlineClients,
  list_guests: get('/api/s/{site}/stat/guest', { params: within(8760) }),
  list_users: get('/api/s/{site}/list/user'),
  list_user_groups: get('/api/s/{site}/list/usergroup'),
  stat_all_users: get('/api/s/{site}/stat/alluser', {
    params: (o) => ({ within: o.since ?? 8760, type: 'all', conn: 'all' }),
  }),
  stat_authorizations: get('/api/s/{site}/stat/authorization', {
    params: (o, now) => secondsWindow(o, now),
  }),
  stat_sessions: get('/api/s/{site}/stat/session', {
    params: (o, now) => ({ ...secondsWindow(o, now), type: 'all', mac: mac(o.clientMac) }),
  }),
  list_devices: get('/api/s/{site}/stat/device', { resource: (o) => mac(o.deviceMac) }),
  list_wlan_groups: get('/api/s/{site}/list/wlangroup'),
  list_rouge_access_points: rogueAccessPoints,
  list_rogue_access_points: rogueAccessPoints,
  list_known_rogue_access_points: get('/api/s/{site}/rest/rogueknown'),
  list_tags: get('/api/s/{site}/rest/tag'),
  five_minute_site_stats: siteReport('5minutes', 12 * HOUR_MS),
  hourly_site_stats: siteReport('hourly', 7 * DAY_MS),
  daily_site_stats: siteReport('daily', 52 * 7 * DAY_MS),
  all_sites_stats: get('/api/stat/sites'),
  five_minute_access_point_stats: accessPointReport('5minutes', 12 * HOUR_MS),
  hourly_access_point_stats: accessPointReport('hourly', 7 * DAY_MS),
  daily_access_point_stats: accessPointReport('daily', 7 * DAY_MS),
  five_minute_site_dashboard_metrics: get('/api/s/{site}/stat/dashboard', {
    params: () => ({ scale: '5minutes' }),
  }),
  hourly_site_dashboard_metrics: get('/api/s/{site}/stat/dashboard'),
  site_health_metrics: get('/api/s/{site}/stat/health'),
  port_forwarding_stats: get('/api/s/{site}/stat/portforward'),
  dpi_stats: get('/api/s/{site}/stat/dpi'),
  stat_vouchers: get('/api/s/{site}/stat/voucher', {
    params: (o) => ({ created_time: o.createdTime }),
  }),
  stat_payments: get('/api/s/{site}/stat/payment', { params: within() }),
  list_hotspot_operators: get('/api/s/{site}/rest/hotspotop'),
  list_sites: get('/api/self/sites'),
  sysinfo: get('/api/s/{site}/stat/sysinfo'),
  list_site_settings: get('/api/s/{site}/get/setting'),
  list_admins_for_current_site: command('/api/s/{site}/cmd/sitemgr', 'get-admins'),
  list_admins_for_all_sites: get('/api/stat/admin'),
  list_wlan_configuration: get('/api/s/{site}/rest/wlanconf', { resource: (o) => id(o.wlanId) }),
  list_current_channels: get('/api/s/{site}/stat/current-channel'),
  list_voip_extensions: get('/api/s/{site}/list/extension'),
  list_network_configuration: get('/api/s/{site}/rest/networkconf', {
    resource: (o) => id(o.networkId),
  }),
  list_port_configuration: get('/api/s/{site}/list/portconf'),
  list_port_forwarding_rules: get('/api/s/{site}/list/portforward'),
  list_firewall_groups: get('/api/s/{site}/rest/firewallgroup'),
  dynamic_dns_configuration: get('/api/s/{site}/list/dynamicdns'),
  list_country_codes: get('/api/s/{site}/stat/ccode'),
  list_auto_backups: command('/api/s/{site}/cmd/backup', 'list-backups'),
  list_radius_profiles: get('/api/s/{site}/rest/radiusprofile'),
  list_radius_accounts: get('/api/s/{site}/rest/account'),
  list_alarms: get('/api/s/{site}/list/alarm'),
  list_events: get('/api/s/{site}/stat/event', {
    params: (o) => ({
      _sort: '-time',
      within: o.since ?? 720,
      _start: o.startNum ?? 0,
      _limit: o.limitNum ?? 3000,
    }),
  }),
};

// ============================================================================
// Request Construction
// ============================================================================

export function isQueryName(value: string): value is QueryName {
  return QUERY_NAMES.some((name) => name === value);
}

// Colons stay readable in MAC path segments
const segment = (value: string) => encodeURIComponent(value).replace(/%3A/gi, ':');

function toSearch(params: QueryParams): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    if (typeof value === 'string' || typeof value === 'number') {
      search.append(key, String(value));
    } else {
      value.forEach((item) => search.append(key, item));
    }
  }
  return search.toString();
}

export function buildQueryRequest(
  name: QueryName,
  site: string,
  options: QueryOptions,
  now: number
): QueryRequest {
  const descriptor = QUERIES[name];

  let path = descriptor.path.replace('{site}', segment(site));
  const resource = descriptor.resource?.(options);
  if (resource) {
    path += `/${segment(resource)}`;
  }

  const search = descriptor.params ? toSearch(descriptor.params(options, now)) : '';

  return {
    method: descriptor.method,
    path: search ? `${path}?${search}` : path,
    ...(descriptor.body ? { body: JSON.stringify(descriptor.body) } : {}),
  };
}
