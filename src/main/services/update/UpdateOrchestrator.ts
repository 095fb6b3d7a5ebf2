import type {
  DisplaySurface,
  InstallLaunchResult,
  ReleaseFetchError,
  ReleaseFetchResult,
  UpdateCheckOutcome,
  UpdateCheckTrigger,
  UpdatePolicy,
  UpdateState,
  Version
} from '@shared/contracts';
import type { AppLogger } from '@main/services/logging/Logger';
import type { InstallTarget } from '@main/services/update/UpdateInstaller';
import type { UpdatePolicyStore } from '@main/services/update/UpdatePolicyStore';
import type { UpdateStateStore } from '@main/services/update/UpdateStateStore';
import { isNewer, parseVersion, stripTagPrefix } from '@main/services/update/VersionComparator';

export interface UpdateOrchestratorDeps {
  stateStore: UpdateStateStore;
  policyStore: Pick<UpdatePolicyStore, 'get' | 'set'>;
  probe: { hasConnectivity(): Promise<boolean> };
  credentials: { loadToken(): string | null };
  releaseClient: { fetchLatestRelease(token: string | null): Promise<ReleaseFetchResult> };
  installer: { launch(target: InstallTarget): Promise<InstallLaunchResult> };
  display: Pick<DisplaySurface, 'presentUpdateDecision' | 'presentMessage'>;
  logger: AppLogger;
  currentVersion: string;
  owner: string;
  repo: string;
}

export type StartupCheckOutcome = UpdateCheckOutcome | 'disabled';

export class UpdateOrchestrator {
  private readonly installedVersion: Version;

  constructor(private readonly deps: UpdateOrchestratorDeps) {
    // a versao instalada pode vir com prefixo "v" do arquivo de config
    this.installedVersion = parseVersion(stripTagPrefix(deps.currentVersion));
  }

  getState(): UpdateState {
    return this.deps.stateStore.get();
  }

  getPolicy(): UpdatePolicy {
    return this.deps.policyStore.get();
  }

  setAutoCheck(enabled: boolean): UpdatePolicy {
    const policy = this.deps.policyStore.set({ autoCheck: enabled });
    this.deps.logger.info('update.policy.changed', { autoCheck: policy.autoCheck });
    return policy;
  }

  async runStartupCheck(): Promise<StartupCheckOutcome> {
    if (!this.deps.policyStore.get().autoCheck) {
      this.deps.logger.info('update.startup.disabled');
      return 'disabled';
    }

    return this.checkForUpdate('startup');
  }

  async checkForUpdate(trigger: UpdateCheckTrigger = 'manual'): Promise<UpdateCheckOutcome> {
    const { stateStore, logger, display } = this.deps;

    // a transicao para checking acontece antes de qualquer await: uma segunda chamada ja ve o estado
    const current = stateStore.get();
    if (!stateStore.transition({ phase: 'checking' })) {
      logger.info('update.check.rejected', { trigger, phase: current.phase });
      return 'rejected';
    }

    logger.info('update.check.start', { trigger, currentVersion: this.deps.currentVersion });

    try {
      if (!(await this.deps.probe.hasConnectivity())) {
        this.finishCheck();
        // no boot ninguem pediu a verificacao: fica so no log
        if (trigger === 'startup') {
          logger.warn('update.startup.no_connectivity');
        } else {
          logger.warn('update.check.no_connectivity', { trigger });
          display.presentMessage('No network connection', 'error');
        }
        return 'no-connectivity';
      }

      display.presentMessage('Checking for updates...', 'info');

      const token = this.deps.credentials.loadToken();
      const result = await this.deps.releaseClient.fetchLatestRelease(token);

      if (!result.ok) {
        logger.warn('update.check.finish', { trigger, outcome: 'failed', error: result.error.kind });
        this.finishCheck();
        display.presentMessage(describeFetchError(result.error), 'error');
        return 'failed';
      }

      const latest = stripTagPrefix(result.release.rawTag);
      if (!isNewer(this.installedVersion, result.release.tagVersion)) {
        logger.info('update.check.finish', { trigger, outcome: 'up-to-date', latest });
        this.finishCheck();
        display.presentMessage('Software is up to date', 'info');
        return 'up-to-date';
      }

      stateStore.transition({ phase: 'awaiting-confirmation', pendingVersion: latest });
      logger.info('update.check.finish', { trigger, outcome: 'update-available', latest });
      display.presentUpdateDecision(latest);
      return 'update-available';
    } catch (error) {
      logger.error('update.check.error', {
        trigger,
        reason: error instanceof Error ? error.message : String(error)
      });
      this.finishCheck();
      display.presentMessage('Update check failed', 'error');
      return 'failed';
    }
  }

  async confirm(): Promise<InstallLaunchResult | null> {
    const { stateStore, logger, display } = this.deps;
    const state = stateStore.get();
    if (state.phase !== 'awaiting-confirmation') {
      logger.debug('update.confirm.ignored', { phase: state.phase });
      return null;
    }

    const version = state.pendingVersion;
    stateStore.transition({ phase: 'installing', pendingVersion: version });
    logger.info('update.install.confirmed', { version });
    display.presentMessage('Installing update...', 'warning');

    let result: InstallLaunchResult;
    try {
      result = await this.deps.installer.launch({ owner: this.deps.owner, repo: this.deps.repo, version });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.error('update.install.error', { version, reason });
      result = { ok: false, exitCode: null, message: reason };
    }

    stateStore.transition({ phase: 'idle' });
    if (result.ok) {
      display.presentMessage('Update started - check logs', 'success');
    } else {
      display.presentMessage('Update failed to start', 'error');
    }
    return result;
  }

  cancel(): boolean {
    const { stateStore, logger, display } = this.deps;
    const state = stateStore.get();
    if (state.phase !== 'awaiting-confirmation') {
      logger.debug('update.cancel.ignored', { phase: state.phase });
      return false;
    }

    stateStore.transition({ phase: 'cancelled' });
    logger.info('update.install.cancelled', { version: state.pendingVersion });
    stateStore.transition({ phase: 'idle' });
    display.presentMessage('Update cancelled', 'warning');
    return true;
  }

  private finishCheck(): void {
    this.deps.stateStore.transition({ phase: 'idle' });
  }
}

export function describeFetchError(error: ReleaseFetchError): string {
  switch (error.kind) {
    case 'connection_failed':
      return 'OTA: Connection failed';
    case 'auth_failed':
      return 'OTA: Authentication failed';
    case 'not_found':
      return 'OTA: No releases found';
    case 'api_error':
      return `OTA: API error (HTTP ${error.status})`;
    case 'invalid_response':
      return 'OTA: Invalid response';
  }
}
