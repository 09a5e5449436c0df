#!/usr/bin/env node
import 'dotenv/config'
import process from 'node:process'
import {resolve} from 'node:path'
import chalk from 'chalk'
import {Command} from 'commander'
import pino from 'pino'
import {ValidationError} from '../errors.js'
import {OcCliBuildClient} from '../engine/oc-client.js'
import {DirectoryArtifactSink} from '../core/artifacts.js'
import {createSourceBuild} from '../core/build-spec.js'
import {defaultConfigFile, loadConfig, type SourceStepFileConfig} from '../core/config.js'
import {InfraFailureClassifier} from '../core/infra-classifier.js'
import {parseJobSpec} from '../core/job-spec.js'
import {ConsoleReporter} from '../core/reporter.js'
import {SourceStep} from '../core/source-step.js'
import {errorMessage} from '../core/utils.js'
import type {JobSpec, SourceStepConfiguration} from '../types.js'
import {InteractiveReporter} from './reporter.js'

type GlobalOptions = {
  json?: boolean;
}

function getGlobalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>()
}

function requireStep(config: SourceStepFileConfig, file: string): SourceStepConfiguration {
  if (!config.step) {
    throw new ValidationError(`No step configured in ${file}`)
  }

  return config.step
}

function loadJobSpec(config: SourceStepFileConfig): JobSpec {
  const raw = process.env.JOB_SPEC
  if (!raw) {
    throw new ValidationError('JOB_SPEC is not set')
  }

  return parseJobSpec(raw, {namespace: config.namespace ?? process.env.NAMESPACE ?? ''})
}

async function main() {
  const program = new Command()

  program
    .name('source-step')
    .description('Clone job sources into a pipeline image through a cluster build')
    .version('0.1.0')
    .option('--json', 'Output structured JSON logs')

  program
    .command('run')
    .description('Build the source image and print its digest parameter')
    .argument('[config]', 'Step configuration file', defaultConfigFile)
    .action(async (configFile: string, _options: Record<string, unknown>, cmd: Command) => {
      const {json} = getGlobalOptions(cmd)
      const file = resolve(configFile)
      const config = await loadConfig(file)
      const step = requireStep(config, file)
      const jobSpec = loadJobSpec(config)

      const logger = pino({level: 'info'})
      const reporter = json ? new ConsoleReporter(logger) : new InteractiveReporter()
      const artifactDir = process.env.ARTIFACT_DIR

      const sourceStep = new SourceStep({
        config: step,
        resources: config.resources ?? {},
        client: new OcCliBuildClient(),
        jobSpec,
        cloneAuth: config.cloneAuth,
        pullSecret: config.pullSecret,
        lifecycle: {
          classifier: new InfraFailureClassifier().withRules(config.infra ?? {}),
          reporter,
          artifacts: artifactDir ? new DirectoryArtifactSink(artifactDir) : undefined,
          pollIntervalMs: config.pollIntervalMs
        }
      })

      const controller = new AbortController()
      const abort = (signal: NodeJS.Signals) => {
        controller.abort(new Error(`interrupted by ${signal}`))
      }

      process.once('SIGINT', abort)
      process.once('SIGTERM', abort)

      try {
        await sourceStep.run(controller.signal)
        for (const [key, parameter] of sourceStep.provides()) {
          console.log(`${key}=${await parameter.resolve(controller.signal)}`)
        }
      } catch (error: unknown) {
        if (json) {
          logger.error({step: sourceStep.name(), error: errorMessage(error)}, 'Step failed')
        } else {
          console.error(chalk.red(`\n✗ ${sourceStep.description()} failed:\n${errorMessage(error)}\n`))
        }

        process.exitCode = 1
      } finally {
        process.off('SIGINT', abort)
        process.off('SIGTERM', abort)
      }
    })

  program
    .command('render')
    .description('Print the build request without contacting the cluster')
    .argument('[config]', 'Step configuration file', defaultConfigFile)
    .requiredOption('--clonerefs <pullspec>', 'Pull spec of the image holding clonerefs')
    .action(async (configFile: string, options: {clonerefs: string}) => {
      const file = resolve(configFile)
      const config = await loadConfig(file)
      const build = createSourceBuild({
        config: requireStep(config, file),
        jobSpec: loadJobSpec(config),
        clonerefsRef: {kind: 'DockerImage', name: options.clonerefs},
        resources: config.resources ?? {},
        cloneAuth: config.cloneAuth,
        pullSecret: config.pullSecret
      })
      console.log(JSON.stringify(build, null, 2))
    })

  await program.parseAsync()
}

try {
  await main()
} catch (error: unknown) {
  console.error(chalk.red(`Fatal error: ${errorMessage(error)}`))
  process.exitCode = 1
}
