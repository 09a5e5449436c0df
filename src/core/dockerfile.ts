import type {CloneAuthConfig} from '../types.js'
import {oauthSecretKey, oauthTokenPath, sourceRoot, sshConfigPath, sshPrivateKeyPath, sshPrivateKeySecretKey} from './clonerefs.js'

/** Image stream every pipeline tag lives in. */
export const pipelineImageStream = 'pipeline'

/**
 * Dockerfile that runs clonerefs on top of the base pipeline image.
 *
 * The clone credential is removed in the same script so that it does not
 * remain readable in the final image.
 */
export function sourceDockerfile(fromTag: string, workingDir: string, auth?: CloneAuthConfig): string {
  const lines = [
    '',
    `FROM ${pipelineImageStream}:${fromTag}`,
    'ADD ./clonerefs /clonerefs'
  ]

  let secretPath: string | undefined
  switch (auth?.type) {
    case 'SSH': {
      lines.push(
        `ADD ${sshConfigPath} /etc/ssh/ssh_config`,
        `COPY ./${sshPrivateKeySecretKey} ${sshPrivateKeyPath}`
      )
      secretPath = sshPrivateKeyPath
      break
    }

    case 'OAuth': {
      lines.push(`COPY ./${oauthSecretKey} ${oauthTokenPath}`)
      secretPath = oauthTokenPath
      break
    }

    case undefined: {
      break
    }
  }

  lines.push(
    `RUN umask 0002 && /clonerefs && find ${sourceRoot}/src -type d -not -perm -0775 | xargs --max-procs 10 --max-args 100 --no-run-if-empty chmod g+xw`,
    `WORKDIR ${workingDir}/`,
    `ENV GOPATH=${sourceRoot}`
  )

  if (secretPath) {
    lines.push(`RUN rm -f ${secretPath}`)
  }

  lines.push('')
  return lines.join('\n')
}
