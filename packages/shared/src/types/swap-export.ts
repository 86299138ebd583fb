/**
 * Header written above a downloaded copy of the league schedule
 */
export const SCHEDULE_CSV_HEADERS = [
  'Division',
  'GameID',
  'Date',
  'Time',
  'Arena',
  'Home Team',
  'Away Team',
] as const;

/**
 * Header of the swap candidate file handed to the coordinator
 */
export const SWAP_CSV_HEADERS = [
  'Division',
  'Game ID',
  'Date',
  'Time',
  'Arena',
  'Home Team',
  'Away Team',
] as const;
