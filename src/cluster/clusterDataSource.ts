import { getLogger } from '@fluidware-it/saddlebag';
import type { KubeClients } from './k8sClient';
import type {
  NodeObject,
  NodeUsageSample,
  PodObject,
  PodPhase,
  PodScope,
  PodUsageSample,
  WorkloadKind,
  WorkloadObject
} from '../types/k8s';
import {
  filterNodeData,
  filterNodeMetrics,
  filterPodData,
  filterPodMetrics,
  filterWorkloadData,
  isDefined,
  listItems
} from '../utils/k8sDataFilter';
import { findBarePods } from '../utils/ownerResolver';
import { extractK8sErrorMessage, FatalConfigurationError, getStatusCode, toDataFetchError } from '../utils/errors';

const logger = getLogger();

const DEPLOYMENT_CONFIG = { group: 'apps.openshift.io', version: 'v1', plural: 'deploymentconfigs' } as const;

/**
 * Where the accounting engine gets its raw data from. Every method returns canonical,
 * already-decoded objects; per-query failures reject with a DataFetchError.
 */
export interface ClusterDataSource {
  // Server version; rejects with FatalConfigurationError when the cluster cannot be used at all
  checkAccess(): Promise<string>;
  listNamespaces(): Promise<string[]>;
  // Rejects with FatalConfigurationError when the namespace is missing or hidden from this user
  readNamespace(name: string): Promise<void>;
  listWorkloads(namespace: string, kinds: readonly WorkloadKind[]): Promise<WorkloadObject[]>;
  listPods(scope: PodScope, phases?: readonly PodPhase[]): Promise<PodObject[]>;
  listNodes(labelSelector?: string): Promise<NodeObject[]>;
  // undefined when no metrics API answers (metrics-server not installed, no permission)
  topPods(namespace: string): Promise<PodUsageSample[] | undefined>;
  topNodes(): Promise<NodeUsageSample[] | undefined>;
}

function decodePods(raw: unknown, phases: readonly PodPhase[] | undefined): PodObject[] {
  const pods = listItems(raw).map(filterPodData).filter(isDefined);
  if (!phases || phases.length === 0) return pods;
  return pods.filter(pod => phases.some(phase => phase === pod.phase));
}

export class K8sClusterDataSource implements ClusterDataSource {
  private readonly clients: KubeClients;

  constructor(clients: KubeClients) {
    this.clients = clients;
  }

  async checkAccess(): Promise<string> {
    try {
      const version = await this.clients.versionApi.getCode();
      return version.gitVersion;
    } catch (e: unknown) {
      const message = extractK8sErrorMessage(e, `context ${this.clients.contextName}`);
      throw new FatalConfigurationError(
        `Cannot reach the cluster of context "${this.clients.contextName}" (not logged in?): ${message}`,
        { cause: e }
      );
    }
  }

  async listNamespaces(): Promise<string[]> {
    try {
      const res = await this.clients.coreApi.listNamespace();
      return res.items.map(ns => ns.metadata?.name).filter((name): name is string => !!name);
    } catch (e: unknown) {
      throw new FatalConfigurationError(`Cannot list namespaces: ${extractK8sErrorMessage(e, 'namespaces')}`, {
        cause: e
      });
    }
  }

  // A pod list in a missing namespace is just empty, so a typo would report zeros without this
  async readNamespace(name: string): Promise<void> {
    try {
      await this.clients.coreApi.readNamespace({ name });
    } catch (e: unknown) {
      const status = getStatusCode(e);
      const reason =
        status === 404 || status === 403
          ? 'does not exist or access denied'
          : `cannot be read: ${extractK8sErrorMessage(e, `namespace ${name}`)}`;
      throw new FatalConfigurationError(`Namespace "${name}" ${reason}`, { cause: e });
    }
  }

  async listWorkloads(namespace: string, kinds: readonly WorkloadKind[]): Promise<WorkloadObject[]> {
    const lists = await Promise.all(kinds.map(kind => this.listWorkloadKind(namespace, kind)));
    return lists.flat();
  }

  async listPods(scope: PodScope, phases?: readonly PodPhase[]): Promise<PodObject[]> {
    // One phase can be filtered server side; several are filtered here
    const phase = phases?.length === 1 ? phases[0] : undefined;
    const selector = phase ? { fieldSelector: `status.phase=${phase}` } : {};
    const resource = scope === 'all' ? 'pods in all namespaces' : `pods in ${scope.namespace}`;
    try {
      const res =
        scope === 'all'
          ? await this.clients.coreApi.listPodForAllNamespaces(selector)
          : await this.clients.coreApi.listNamespacedPod({ namespace: scope.namespace, ...selector });
      return decodePods(res, phases);
    } catch (e: unknown) {
      throw toDataFetchError(e, resource);
    }
  }

  async listNodes(labelSelector?: string): Promise<NodeObject[]> {
    try {
      const res = await this.clients.coreApi.listNode(labelSelector ? { labelSelector } : {});
      return listItems(res).map(filterNodeData).filter(isDefined);
    } catch (e: unknown) {
      throw toDataFetchError(e, 'nodes');
    }
  }

  async topPods(namespace: string): Promise<PodUsageSample[] | undefined> {
    try {
      const metrics = await this.clients.metricsClient.getPodMetrics(namespace);
      return metrics.items.flatMap(item => filterPodMetrics(item));
    } catch (e: unknown) {
      logger.warn(`Pod metrics unavailable for ${namespace}: ${extractK8sErrorMessage(e, namespace)}`);
      return undefined;
    }
  }

  async topNodes(): Promise<NodeUsageSample[] | undefined> {
    try {
      const metrics = await this.clients.metricsClient.getNodeMetrics();
      return metrics.items.map(item => filterNodeMetrics(item)).filter(isDefined);
    } catch (e: unknown) {
      logger.warn(`Node metrics unavailable: ${extractK8sErrorMessage(e, 'nodes')}`);
      return undefined;
    }
  }

  private async listWorkloadKind(namespace: string, kind: WorkloadKind): Promise<WorkloadObject[]> {
    try {
      if (kind === 'Pod') return await this.listBarePods(namespace);
      const items = await this.fetchWorkloadItems(namespace, kind);
      return items.map(item => filterWorkloadData(item, kind, namespace)).filter(isDefined);
    } catch (e: unknown) {
      throw toDataFetchError(e, `${kind} in ${namespace}`);
    }
  }

  // Pods without a controller are workloads of their own, with one replica
  private async listBarePods(namespace: string): Promise<WorkloadObject[]> {
    const pods = decodePods(await this.clients.coreApi.listNamespacedPod({ namespace }), undefined);
    return findBarePods(pods).map(
      (pod): WorkloadObject => ({
        kind: 'Pod',
        name: pod.name,
        namespace: pod.namespace,
        replicas: 1,
        containers: pod.containers
      })
    );
  }

  private async fetchWorkloadItems(namespace: string, kind: Exclude<WorkloadKind, 'Pod'>): Promise<unknown[]> {
    const { appsApi } = this.clients;
    switch (kind) {
      case 'Deployment':
        return listItems(await appsApi.listNamespacedDeployment({ namespace }));
      case 'StatefulSet':
        return listItems(await appsApi.listNamespacedStatefulSet({ namespace }));
      case 'DaemonSet':
        return listItems(await appsApi.listNamespacedDaemonSet({ namespace }));
      case 'DeploymentConfig':
        return this.fetchDeploymentConfigs(namespace);
    }
  }

  // DeploymentConfigs only exist on OpenShift; a 404 means the API is not served here
  private async fetchDeploymentConfigs(namespace: string): Promise<unknown[]> {
    try {
      const res: unknown = await this.clients.customObjectsApi.listNamespacedCustomObject({
        ...DEPLOYMENT_CONFIG,
        namespace
      });
      return listItems(res);
    } catch (e: unknown) {
      if (getStatusCode(e) === 404) {
        logger.debug(`No DeploymentConfig API on this cluster (namespace ${namespace})`);
        return [];
      }
      throw e;
    }
  }
}
