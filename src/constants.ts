export const TEMPLATE = {
  error400: 'error400',
  error500: 'error500',
  database: 'pdo_error',
  extension: '.hbs',
  errorPath: 'Error',
  layoutPath: 'Layout',
  errorLayout: 'error',
  defaultLayout: 'default',
} as const;

export const MESSAGES = {
  notFound: 'Not Found',
  internal: 'An Internal Error Has Occurred.',
} as const;

/** The only helpers the safe error render loads. */
export const SAFE_HELPERS = ['Form', 'Html'] as const;

export const EVENTS = {
  controllerInitialize: 'Controller.initialize',
  controllerStartup: 'Controller.startup',
  controllerBeforeRender: 'Controller.beforeRender',
  controllerShutdown: 'Controller.shutdown',
  viewBeforeRender: 'View.beforeRender',
  viewAfterRender: 'View.afterRender',
  viewBeforeLayout: 'View.beforeLayout',
  viewAfterLayout: 'View.afterLayout',
  beforeDispatch: 'Dispatcher.beforeDispatch',
  afterDispatch: 'Dispatcher.afterDispatch',
} as const;

export const REGEX = {
  SAFE_TRACE: /^[a-zA-Z0-9-_:.]{1,128}$/,
  ERROR_SUFFIX: /(?:Exception|Error)$/,
} as const satisfies Readonly<Record<string, RegExp>>;
