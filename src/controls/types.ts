export type ControlActions = {
  listen: () => void;
  switchLanguage: () => void;
  quit: () => void;
};

export type ControlHandle = {
  stop: () => void;
};
