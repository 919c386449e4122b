export type ConnectivityState = "Online" | "Offline" | "Probing";

export type ConnectivityChange = {
  state: ConnectivityState;
  previous: ConnectivityState;
  at: number;
};
