export const GAME_CONFIG = {
  // Phase timings (ms)
  READING_TIME_LIMIT: 10000,
  BUZZER_WINDOW: 0, // 0 = buzzer stays open until someone presses
  BUZZER_PAUSE_DURATION: 1500,
  ANSWER_TIME_LIMIT: 15000,
  COUNTDOWN_STEPS: 3,
  COUNTDOWN_STEP_DURATION: 1000,
  QUESTION_TIME_LIMIT: 30000,
  RESULT_PAUSE_DURATION: 2000,

  // Track
  FINISH_LINE: 100,
  TRACK_INCREMENT: 20,

  TICK_RATE_HZ: 60,
  STATE_BROADCAST_INTERVAL: 250, // timers keep moving between events
  ROBOT_CHANNEL: 'robot:commands',

  // Events
  EVENTS: {
    // Client to Server
    SELECT_LEVEL: 'select_level',
    CLAIM_BUZZER: 'claim_buzzer',
    SELECT_OPTION: 'select_option',
    SKIP: 'skip',
    CANCEL: 'cancel',
    RESTART: 'restart',

    // Server to Client
    CONNECTED: 'connected',
    STATE: 'state',
    GAME_EVENT: 'game_event',
  },
} as const;
