import React, { useState } from 'react';
import { Button } from '../packages/ui/Button.tsx';
import { useSnapshot } from '../state-store/react/useSnapshot.ts';
import { getActionStatus } from '../state-store/utils/asyncHelpers.ts';
import { FollowersViewModel } from './viewModels/FollowersViewModel.ts';

interface FollowersViewProps {
  viewModel?: FollowersViewModel;
}

export const FollowersView: React.FC<FollowersViewProps> = (props) => {
  const [viewModel] = useState(() => props.viewModel ?? new FollowersViewModel());
  const { followers, actions } = useSnapshot(viewModel);
  const { isLoading, isError, errorMessage } = getActionStatus(actions.get('fetchFollowers'));

  if (isLoading) {
    return <div className="followers-status">Loading...</div>;
  }

  if (isError) {
    return (
      <div className="followers-status">
        <p className="followers-error">Error: {errorMessage}</p>
        <Button label="Retry" onClick={() => viewModel.triggerUIAction('tappedFollowersRetryButton')} />
      </div>
    );
  }

  if (followers.length === 0) {
    return (
      <div className="followers-status">
        <p className="followers-empty">No followers found.</p>
        <Button primary label="Load Followers" onClick={() => viewModel.triggerUIAction('tappedFollowersButton')} />
      </div>
    );
  }

  return (
    <ul className="followers-list">
      {followers.map((follower) => (
        <li key={follower.id}>
          <img src={follower.avatar_url} alt={follower.login} width={40} height={40} style={{ borderRadius: '50%' }} />
          <span>{follower.login}</span>
        </li>
      ))}
    </ul>
  );
};

const App: React.FC = () => {
  return (
    <main className="app">
      <h1>Followers</h1>
      <FollowersView />
    </main>
  );
};

export default App;
