/**
 * Injected into the client's system prompt at initialization.
 */
export const SERVER_INSTRUCTIONS = `
ESIOS - Spanish electricity system operator (REE) market and system indicators

## Key Capabilities
- Search the published indicators (prices, demand, generation, exchanges, ...)
- Retrieve the time series of one indicator over a date range

## Usage Patterns
- Call search_indicators first to find the indicator ID, then get_indicator_data
- Use time_agg "average" for prices and "sum" for energy quantities
- Use time_trunc "day" or coarser for long ranges

## Important Notes
- Dates are ISO-8601; values without an offset are read as UTC
- The provider limits range size and history; its rejection comes back as an InvalidRequest error
- Unknown indicator IDs come back as NotFound errors
- No caching and no retries: each call is one request to the ESIOS API
`.trim();
