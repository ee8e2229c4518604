// src/lib/perf-log.ts

// ⏱️ PERFORMANCE LOGGER
export const perfLog = (label: string, startTime: number): number => {
  const duration = performance.now() - startTime;
  const color = duration < 50 ? '🟢' : duration < 150 ? '🟡' : '🔴';
  console.log(`${color} [API PERF] ${label}: ${duration.toFixed(2)}ms`);
  return duration;
};
