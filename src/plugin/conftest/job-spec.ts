/**
 * Conftest scan job specification
 *
 * Builds the pod and secret that run Conftest against a snapshot of one
 * workload. The pod never talks to the API server: policies come from a
 * ConfigMap and the workload from a per-audit secret.
 *
 * @module plugin/conftest/job-spec
 */

import { dump as yamlDump } from 'js-yaml';
import type {
  KubernetesObject,
  V1Affinity,
  V1Container,
  V1PodSecurityContext,
  V1PodSpec,
  V1Secret,
  V1SecurityContext,
  V1VolumeMount,
} from '@kubernetes/client-node';

import type { GroupVersionKind, ScanJobSpec } from '../types';

/** Name of the container running Conftest */
export const CONFTEST_CONTAINER_NAME = 'conftest';

/** Policy files mounted from the policy bundle, in mount order */
export const POLICY_FILES: readonly string[] = [
  'kubernetes.rego',
  'uses_image_tag_latest.rego',
  'file_system_not_read_only.rego',
];

export const POLICIES_VOLUME_NAME = 'policies';
export const WORKLOAD_VOLUME_NAME = 'workload';

/** Secret key holding the serialised workload */
export const WORKLOAD_KEY = 'workload.yaml';

export const POLICY_DIR = '/project/policy';
export const WORKLOAD_PATH = `/project/${WORKLOAD_KEY}`;

/** Non-root user and group the scan runs as */
export const SCAN_UID = 1000;
export const SCAN_GID = 1000;

export const RESOURCE_LIMITS = { cpu: '300m', memory: '300M' } as const;
export const RESOURCE_REQUESTS = { cpu: '50m', memory: '50M' } as const;

/**
 * Error thrown when a workload cannot be serialised to YAML.
 */
export class SerializationError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'SerializationError';
  }
}

/**
 * Inputs resolved from configuration for one scan job.
 */
export interface JobSpecOptions {
  imageRef: string;
  /** Name of the per-audit secret; must be unique per call */
  secretName: string;
  serviceAccountName: string;
  policiesConfigMap: string;
}

/**
 * Conftest arguments. `--no-fail` keeps the exit code at zero when policies
 * fail, so a failed container means Conftest itself could not run.
 */
export function getConftestArgs(): string[] {
  return ['test', '--no-fail', '--output', 'json', '--policy', POLICY_DIR, WORKLOAD_PATH];
}

/**
 * Stamp the group, version and kind onto the object in place.
 */
export function setGroupVersionKind(obj: KubernetesObject, gvk: GroupVersionKind): void {
  obj.apiVersion = gvk.group ? `${gvk.group}/${gvk.version}` : gvk.version;
  obj.kind = gvk.kind;
}

/**
 * Serialise a workload to YAML with sorted keys.
 * The object goes through its JSON form first, as it would on the wire, so
 * undefined fields are dropped and dates become strings.
 *
 * @throws SerializationError if the object has no JSON form (cycles, bigints)
 */
export function serializeWorkload(obj: KubernetesObject): string {
  try {
    const plain: unknown = JSON.parse(JSON.stringify(obj));
    return yamlDump(plain, { sortKeys: true, noRefs: true });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SerializationError(
      `Failed to serialise workload to YAML: ${message}`,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Secret carrying the workload snapshot.
 */
export function buildWorkloadSecret(name: string, workloadYAML: string): V1Secret {
  return {
    apiVersion: 'v1',
    kind: 'Secret',
    metadata: {
      name,
    },
    stringData: {
      [WORKLOAD_KEY]: workloadYAML,
    },
  };
}

/**
 * Require scheduling on Linux nodes.
 */
export function linuxNodeAffinity(): V1Affinity {
  return {
    nodeAffinity: {
      requiredDuringSchedulingIgnoredDuringExecution: {
        nodeSelectorTerms: [
          {
            matchExpressions: [
              {
                key: 'kubernetes.io/os',
                operator: 'In',
                values: ['linux'],
              },
            ],
          },
        ],
      },
    },
  };
}

function containerSecurityContext(): V1SecurityContext {
  return {
    privileged: false,
    allowPrivilegeEscalation: false,
    capabilities: {
      drop: ['ALL'],
    },
    readOnlyRootFilesystem: true,
  };
}

function podSecurityContext(): V1PodSecurityContext {
  return {
    runAsUser: SCAN_UID,
    runAsGroup: SCAN_GID,
    runAsNonRoot: true,
    seccompProfile: {
      type: 'RuntimeDefault',
    },
  };
}

function volumeMounts(): V1VolumeMount[] {
  const policyMounts = POLICY_FILES.map(
    (file): V1VolumeMount => ({
      name: POLICIES_VOLUME_NAME,
      mountPath: `${POLICY_DIR}/${file}`,
      subPath: file,
      readOnly: true,
    })
  );

  return [
    ...policyMounts,
    {
      name: WORKLOAD_VOLUME_NAME,
      mountPath: WORKLOAD_PATH,
      subPath: WORKLOAD_KEY,
      readOnly: true,
    },
  ];
}

function conftestContainer(imageRef: string): V1Container {
  return {
    name: CONFTEST_CONTAINER_NAME,
    image: imageRef,
    imagePullPolicy: 'IfNotPresent',
    terminationMessagePolicy: 'FallbackToLogsOnError',
    resources: {
      limits: { ...RESOURCE_LIMITS },
      requests: { ...RESOURCE_REQUESTS },
    },
    volumeMounts: volumeMounts(),
    command: ['conftest'],
    args: getConftestArgs(),
    securityContext: containerSecurityContext(),
  };
}

/**
 * Pod running Conftest once against the mounted policies and workload.
 */
export function buildPodSpec(options: JobSpecOptions): V1PodSpec {
  return {
    serviceAccountName: options.serviceAccountName,
    automountServiceAccountToken: false,
    restartPolicy: 'Never',
    affinity: linuxNodeAffinity(),
    volumes: [
      {
        name: POLICIES_VOLUME_NAME,
        configMap: {
          name: options.policiesConfigMap,
        },
      },
      {
        name: WORKLOAD_VOLUME_NAME,
        secret: {
          secretName: options.secretName,
        },
      },
    ],
    containers: [conftestContainer(options.imageRef)],
    securityContext: podSecurityContext(),
  };
}

/**
 * Build the scan job for a workload.
 * Stamps the kind onto the workload, snapshots it into a secret and
 * mounts that secret into the Conftest pod.
 *
 * @throws SerializationError if the workload cannot be serialised
 */
export function buildScanJob(
  workload: KubernetesObject,
  gvk: GroupVersionKind,
  options: JobSpecOptions
): ScanJobSpec {
  setGroupVersionKind(workload, gvk);
  const secret = buildWorkloadSecret(options.secretName, serializeWorkload(workload));

  return {
    podSpec: buildPodSpec(options),
    secrets: [secret],
  };
}
