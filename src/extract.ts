/**
 * Streaming ZIP extraction using yauzl
 *
 * Archives are unpacked next to themselves and then removed. Each entry is
 * written to a .part file and renamed into place, so an interrupted
 * extraction never leaves a truncated file under its real name.
 */

import { createWriteStream, existsSync, mkdirSync, renameSync } from "node:fs"
import { rm, unlink } from "node:fs/promises"
import { pipeline } from "node:stream/promises"
import { dirname, extname, join } from "node:path"
import yauzl from "yauzl"
import { ArchiveError, describeError } from "./errors.js"
import { log } from "./logger.js"

export type ArchiveOutcome =
	| { status: "extracted"; archivePath: string; extractedFiles: string[] }
	| { status: "invalid"; archivePath: string; error: string }
	| { status: "failed"; archivePath: string; error: string }

/**
 * Check if a file is a ZIP archive by extension
 */
export function isZipArchive(filename: string): boolean {
	return extname(filename).toLowerCase() === ".zip"
}

/**
 * Promisified yauzl.open
 */
function openZip(path: string): Promise<yauzl.ZipFile> {
	return new Promise((resolve, reject) => {
		yauzl.open(
			path,
			{ lazyEntries: true, autoClose: false },
			(err, zipFile) => {
				if (err) reject(err)
				else if (!zipFile) reject(new Error("Failed to open zip file"))
				else resolve(zipFile)
			},
		)
	})
}

/**
 * Get readable stream for a zip entry
 */
function openReadStream(
	zipFile: yauzl.ZipFile,
	entry: yauzl.Entry,
): Promise<NodeJS.ReadableStream> {
	return new Promise((resolve, reject) => {
		zipFile.openReadStream(entry, (err, stream) => {
			if (err) reject(err)
			else if (!stream) reject(new Error("Failed to open read stream"))
			else resolve(stream)
		})
	})
}

/**
 * Stream every entry of an opened archive into destDir, keeping the
 * archive's directory structure. yauzl rejects absolute and ".." entry
 * names before they reach us.
 */
async function extractEntries(
	zipFile: yauzl.ZipFile,
	destDir: string,
): Promise<string[]> {
	const extractedFiles: string[] = []

	await new Promise<void>((resolve, reject) => {
		zipFile.on("error", reject)
		zipFile.on("end", resolve)

		zipFile.on("entry", (entry: yauzl.Entry) => {
			void (async () => {
				const outputPath = join(destDir, entry.fileName)

				if (entry.fileName.endsWith("/")) {
					mkdirSync(outputPath, { recursive: true })
					zipFile.readEntry()
					return
				}

				const partPath = `${outputPath}.part.${process.pid}`
				mkdirSync(dirname(outputPath), { recursive: true })

				const readStream = await openReadStream(zipFile, entry)
				try {
					await pipeline(readStream, createWriteStream(partPath))
				} catch (err) {
					await rm(partPath, { force: true })
					throw err
				}

				// rename replaces an existing file of the same name
				renameSync(partPath, outputPath)
				extractedFiles.push(entry.fileName)

				zipFile.readEntry()
			})().catch(reject)
		})

		zipFile.readEntry()
	})

	return extractedFiles
}

/**
 * Extract a ZIP archive into destDir without touching the archive.
 *
 * Never throws. A file that is not a well-formed zip gives "invalid"; an
 * error part way through gives "failed".
 */
export async function extractZip(
	archivePath: string,
	destDir: string,
): Promise<ArchiveOutcome> {
	let zipFile: yauzl.ZipFile
	try {
		zipFile = await openZip(archivePath)
	} catch (err) {
		const error = new ArchiveError(
			archivePath,
			`not a valid zip file: ${describeError(err)}`,
			{ cause: err },
		)
		log.extract.warn({ archivePath, err: error }, error.message)
		return { status: "invalid", archivePath, error: error.message }
	}

	try {
		mkdirSync(destDir, { recursive: true })
		const extractedFiles = await extractEntries(zipFile, destDir)
		return { status: "extracted", archivePath, extractedFiles }
	} catch (err) {
		const error = new ArchiveError(
			archivePath,
			`extraction failed: ${describeError(err)}`,
			{ cause: err },
		)
		log.extract.error({ archivePath, err: error }, error.message)
		return { status: "failed", archivePath, error: error.message }
	} finally {
		zipFile.close()
	}
}

/**
 * Unpack a downloaded archive in place and delete it.
 *
 * Never throws. An archive that did not extract stays on disk.
 */
export async function processArchive(
	archivePath: string,
): Promise<ArchiveOutcome> {
	const outcome = await extractZip(archivePath, dirname(archivePath))
	if (outcome.status !== "extracted") return outcome

	try {
		if (existsSync(archivePath)) {
			await unlink(archivePath)
		}
	} catch (err) {
		const error = new ArchiveError(
			archivePath,
			`could not delete archive: ${describeError(err)}`,
			{ cause: err },
		)
		log.extract.error({ archivePath, err: error }, error.message)
		return { status: "failed", archivePath, error: error.message }
	}

	log.extract.info(
		{ archivePath, files: outcome.extractedFiles.length },
		"extracted and deleted archive",
	)
	return outcome
}
