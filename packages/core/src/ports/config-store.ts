export interface CouncilConfigPrefs {
  chairmanModel?: string;
  councilModels?: string[];
  timeoutMs?: number;
  apiKeyEncrypted?: string;
}

export interface ConfigStore {
  getCouncilConfigPrefs(): Promise<CouncilConfigPrefs>;
  saveCouncilConfigPrefs(config: CouncilConfigPrefs): Promise<void>;
}
