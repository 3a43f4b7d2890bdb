/**
 * Gateway - Rate Limiter Lua Scripts
 * Executed with EVAL so each check is a single atomic step on the Redis server
 */

/**
 * Fixed window counter.
 *
 * KEYS[1] - counter key for the current window
 * ARGV[1] - maximum requests per window
 * ARGV[2] - window length in milliseconds
 *
 * Returns {allowed, count}. Rejected requests are not counted.
 */
export const FIXED_WINDOW_SCRIPT = `
local counter_key = KEYS[1]
local max_requests = tonumber(ARGV[1])
local window_ms = tonumber(ARGV[2])

local current = tonumber(redis.call('GET', counter_key)) or 0

if current < max_requests then
  current = redis.call('INCR', counter_key)

  -- First hit in this window sets the expiry
  if current == 1 then
    redis.call('PEXPIRE', counter_key, window_ms)
  end

  return {1, current}
end

return {0, current}
`;
