import { describe, it, expect } from 'vitest';
import {
  renderMetrics,
  httpRequestsTotal,
  httpRequestDurationMs,
  externalApiDurationMs,
  gamesProcessedTotal,
  rowsTouchedTotal,
} from '../../../src/infrastructure/metrics';

describe('metrics', () => {
  it('renders Prometheus text format for counters', () => {
    httpRequestsTotal.inc({ method: 'GET', path: '/api/health', status: '200' });
    httpRequestsTotal.inc({ method: 'GET', path: '/api/health', status: '200' });
    httpRequestsTotal.inc({ method: 'POST', path: '/api/compilations', status: '202' });

    const output = renderMetrics();

    expect(output).toContain('# TYPE season_stats_http_requests_total counter');
    expect(output).toContain('season_stats_http_requests_total{method="GET",path="/api/health",status="200"} 2');
    expect(output).toContain('season_stats_http_requests_total{method="POST",path="/api/compilations",status="202"} 1');
  });

  it('renders Prometheus text format for histograms', () => {
    httpRequestDurationMs.observe({ method: 'GET', path: '/api/health', status: '200' }, 42);

    const output = renderMetrics();

    expect(output).toContain('# TYPE season_stats_http_request_duration_ms histogram');
    expect(output).toContain('season_stats_http_request_duration_ms_count{method="GET",path="/api/health",status="200"} 1');
    expect(output).toContain('season_stats_http_request_duration_ms_sum{method="GET",path="/api/health",status="200"} 42');
    // 42ms lands in the 50ms bucket but not the 25ms one
    expect(output).toContain('season_stats_http_request_duration_ms_bucket{method="GET",path="/api/health",status="200",le="25"} 0');
    expect(output).toContain('season_stats_http_request_duration_ms_bucket{method="GET",path="/api/health",status="200",le="50"} 1');
    expect(output).toContain('season_stats_http_request_duration_ms_bucket{method="GET",path="/api/health",status="200",le="+Inf"} 1');
  });

  it('renders the ESPN latency histogram', () => {
    externalApiDurationMs.observe({ provider: 'espn', endpoint: 'summary', status: 'ok' }, 150);

    const output = renderMetrics();

    expect(output).toContain('# TYPE season_stats_external_api_duration_ms histogram');
    expect(output).toContain('season_stats_external_api_duration_ms_count{provider="espn",endpoint="summary",status="ok"} 1');
  });

  it('counts compilation throughput', () => {
    gamesProcessedTotal.inc({ outcome: 'merged' });
    gamesProcessedTotal.inc({ outcome: 'skipped' });
    rowsTouchedTotal.inc({ category: 'rushing' }, 7);

    const output = renderMetrics();

    expect(output).toContain('season_stats_games_total{outcome="merged"} 1');
    expect(output).toContain('season_stats_games_total{outcome="skipped"} 1');
    expect(output).toContain('season_stats_rows_touched_total{category="rushing"} 7');
  });

  it('escapes quotes and backslashes in label values', () => {
    httpRequestsTotal.inc({ method: 'GET', path: '/api/players/"x\\y"', status: '404' });

    expect(renderMetrics()).toContain(
      'season_stats_http_requests_total{method="GET",path="/api/players/\\"x\\\\y\\"",status="404"} 1',
    );
  });

  it('renderMetrics returns all registered metrics', () => {
    const output = renderMetrics();

    expect(output).toContain('# TYPE season_stats_http_requests_total counter');
    expect(output).toContain('# TYPE season_stats_http_request_duration_ms histogram');
    expect(output).toContain('# TYPE season_stats_external_api_duration_ms histogram');
    expect(output).toContain('# TYPE season_stats_games_total counter');
    expect(output).toContain('# TYPE season_stats_rows_touched_total counter');
    expect(output).toContain('# TYPE season_stats_circuit_breaker_state gauge');
    expect(output.endsWith('\n')).toBe(true);
  });
});
