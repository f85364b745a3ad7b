import { AdapterProbeError, errorMessage } from '@/domain/errors';
import { parseMediaControlJson } from '@/adapters/sources/mediaSession/mediaControlReader';
import type { MediaSessionInfo, MediaSessionReader } from '@/adapters/sources/mediaSession/types';
import { CommandError, type CommandRunner } from '@/adapters/system/commandRunner';

/**
 * Reads the current Windows media session (GlobalSystemMediaTransportControls)
 * and prints it in the `media-control get` JSON shape.
 */
export const SMTC_SCRIPT = `
$ErrorActionPreference = 'Stop'
[Console]::OutputEncoding = [System.Text.Encoding]::UTF8
Add-Type -AssemblyName System.Runtime.WindowsRuntime
$asTask = ([System.WindowsRuntimeSystemExtensions].GetMethods() | Where-Object {
  $_.Name -eq 'AsTask' -and $_.GetParameters().Count -eq 1 -and
  $_.GetParameters()[0].ParameterType.Name -eq 'IAsyncOperation\`1'
})[0]
function Await($op, [Type]$type) {
  $task = $asTask.MakeGenericMethod($type).Invoke($null, @($op))
  if (-not $task.Wait(3000)) { throw 'winrt call timed out' }
  $task.Result
}
[Windows.Media.Control.GlobalSystemMediaTransportControlsSessionManager, Windows.Media.Control, ContentType = WindowsRuntime] | Out-Null
[Windows.Storage.Streams.DataReader, Windows.Storage.Streams, ContentType = WindowsRuntime] | Out-Null
$manager = Await ([Windows.Media.Control.GlobalSystemMediaTransportControlsSessionManager]::RequestAsync()) ([Windows.Media.Control.GlobalSystemMediaTransportControlsSessionManager])
$session = $manager.GetCurrentSession()
if ($null -eq $session) { 'null'; exit 0 }
$props = Await ($session.TryGetMediaPropertiesAsync()) ([Windows.Media.Control.GlobalSystemMediaTransportControlsSessionMediaProperties])
$timeline = $session.GetTimelineProperties()
$info = $session.GetPlaybackInfo()
$result = [ordered]@{
  playerName = $session.SourceAppUserModelId
  title = $props.Title
  artist = $props.Artist
  album = $props.AlbumTitle
  playing = ($info.PlaybackStatus.ToString() -eq 'Playing')
  elapsedTime = $timeline.Position.TotalSeconds
  duration = ($timeline.EndTime - $timeline.StartTime).TotalSeconds
}
if ($null -ne $props.Thumbnail) {
  try {
    $stream = Await ($props.Thumbnail.OpenReadAsync()) ([Windows.Storage.Streams.IRandomAccessStreamWithContentType])
    $size = [uint32]$stream.Size
    $reader = [Windows.Storage.Streams.DataReader]::new($stream)
    Await ($reader.LoadAsync($size)) ([uint32]) | Out-Null
    $bytes = New-Object byte[] $size
    $reader.ReadBytes($bytes)
    $result.artworkData = [Convert]::ToBase64String($bytes)
    $result.artworkMimeType = $stream.ContentType
  } catch {
    $result.artworkError = $_.Exception.Message
  }
}
$result | ConvertTo-Json -Compress
`;

export function encodePowerShellCommand(script: string): string {
  return Buffer.from(script, 'utf16le').toString('base64');
}

/**
 * Windows now-playing through an embedded PowerShell script.
 */
export class SmtcReader implements MediaSessionReader {
  public readonly name = 'smtc';
  private readonly encoded = encodePowerShellCommand(SMTC_SCRIPT);

  constructor(
    private readonly run: CommandRunner,
    private readonly timeoutMs: number,
  ) {}

  public async read(): Promise<MediaSessionInfo | null> {
    let stdout: string;
    try {
      ({ stdout } = await this.run(
        'powershell.exe',
        ['-NoProfile', '-NonInteractive', '-ExecutionPolicy', 'Bypass', '-EncodedCommand', this.encoded],
        { timeoutMs: this.timeoutMs },
      ));
    } catch (error) {
      const detail = error instanceof CommandError && error.stderr ? error.stderr.trim() : errorMessage(error);
      throw new AdapterProbeError('primary', `media session script failed: ${detail.slice(0, 300)}`, {
        cause: error,
      });
    }
    try {
      return parseMediaControlJson(stdout);
    } catch (error) {
      throw new AdapterProbeError('primary', errorMessage(error), { cause: error });
    }
  }
}
