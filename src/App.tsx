import { Toaster } from 'sonner';
import { ImageEditor } from '@/components/editor/ImageEditor';

export default function App() {
  return (
    <>
      <ImageEditor />
      <Toaster theme="dark" position="bottom-right" richColors />
    </>
  );
}
