import {
  createResearchServices,
  loadResearchConfig,
  type ResearchConfig,
  type ResearchServices,
} from '@deep-research/research-tools-sdk';
import { FilesystemBlobStorage } from '../storage/filesystem-blob-storage';

/** Lazily builds configuration and services on first use. */
export class CliContainer {
  private config: ResearchConfig | null = null;
  private services: ResearchServices | null = null;

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  getConfig(): ResearchConfig {
    if (!this.config) {
      this.config = loadResearchConfig(this.env);
    }
    return this.config;
  }

  getServices(): ResearchServices {
    if (!this.services) {
      const config = this.getConfig();
      this.services = createResearchServices(
        new FilesystemBlobStorage(config.storageRoot),
        config,
      );
    }
    return this.services;
  }
}
