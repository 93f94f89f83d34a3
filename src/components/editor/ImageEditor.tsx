import { useEffect } from 'react';
import { EditorProvider, useEditor } from '@/contexts/EditorContext';
import { EditorCanvas } from './EditorCanvas';
import { OverlayPreview } from './OverlayPreview';
import { Toolbar } from './Toolbar';
import { TopBar } from './TopBar';
import { NavigationBar } from './NavigationBar';
import { StatusPanel } from './StatusPanel';
import { useKeyboardShortcuts } from '@/hooks/useKeyboardShortcuts';

function EditorContent() {
  useKeyboardShortcuts();
  const { loadInitial } = useEditor();

  useEffect(() => {
    void loadInitial();
  }, [loadInitial]);

  return (
    <div className="min-h-screen flex flex-col bg-neutral-950 text-neutral-100">
      <TopBar />
      <div className="flex-1 flex flex-col gap-4 p-4">
        <Toolbar />
        <div className="flex gap-4 min-h-0">
          <EditorCanvas />
          <OverlayPreview />
        </div>
        <NavigationBar />
        <StatusPanel />
      </div>
    </div>
  );
}

export function ImageEditor() {
  return (
    <EditorProvider>
      <EditorContent />
    </EditorProvider>
  );
}
