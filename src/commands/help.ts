/**
 * CLI help text.
 */
export const HELP_TEXT = `
clusterbox - disposable multi-node k3s clusters, one container per node

Usage:
  clusterbox check-engine                    Check that the container engine is reachable

  clusterbox create [--name NAME]            Create a cluster
    -i, --image IMAGE                        Node image (default from config)
    -w, --workers N                          Number of worker nodes (default 0)
    -p, --publish SPEC                       Publish ports: [ip:][hostPort:]containerPort[/proto][@node]...
                                             node is all | server | master | workers | a node name
                                             (repeatable; default node group: server)
    -v, --volume SRC:DST                     Bind mount into every node (repeatable, comma lists allowed)
    -e, --env KEY=VALUE                      Extra server environment (repeatable)
    -x, --server-arg ARG                     Extra server argument (repeatable)
    --api-port PORT                          API server port (default 6443)
    --wait [SECONDS]                         Wait for the server to become ready (0 or none = forever)
    --timeout SECONDS                        Same as a value for --wait
    --port-auto-offset N                     Shift worker host ports by N + worker index
    --verbose                                Show image pull progress

  clusterbox delete [--name NAME | --all]    Delete cluster(s) and their networks
  clusterbox stop   [--name NAME | --all]    Stop cluster(s)
  clusterbox start  [--name NAME | --all]    Start stopped cluster(s)
  clusterbox list   [--name NAME]            List clusters
  clusterbox get-credentials [--name NAME]   Print the path to the cluster's kubeconfig

Environment:
  CLUSTERBOX_HOME                            Config and cluster directory (default ~/.config/clusterbox)
  CLUSTERBOX_IMAGE, CLUSTERBOX_CLUSTER, CLUSTERBOX_API_PORT
  DOCKER_HOST                                Container engine endpoint
  LOG_LEVEL                                  debug | info | warn | error
`;

export function help(): void {
  process.stdout.write(HELP_TEXT);
}
